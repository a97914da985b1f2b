// ---------------------------------------------------------------------------
// index.ts — Main entry point for @tessera/compiler
// ---------------------------------------------------------------------------
// Provides the top-level `compile()` function that runs a unit through the
// lexer, template parser, style compiler, analyzer and code generator, and
// turns every failure along the way into a diagnostic.
// ---------------------------------------------------------------------------

export * from './errors'
export { createLocator, formatLocation, positionAt, START, type SourceLocation } from './location'
export {
  tokenize,
  splitSections,
  type Section,
  type SectionKind,
  type SectionLayout,
  type TokenStreams,
  type LogicToken,
} from './lexer'
export { tokenizeMarkup, type MarkupToken, type MarkupAttribute } from './markup-lexer'
export { tokenizeStyle, type StyleToken } from './style-lexer'
export {
  parseTemplate,
  parseMarkup,
  serializeTemplate,
  splitFilters,
  DIRECTIVE_PREFIX,
  type TemplateNode,
  type ElementNode,
  type TextNode,
  type InterpolationNode,
  type ConditionalNode,
  type LoopNode,
  type SlotNode,
  type Attribute,
  type Directive,
  type DirectiveKind,
  type FilterCall,
  type TemplateParseOptions,
  type TemplateParseResult,
} from './template-parser'
export {
  compileStyle,
  compileStyleTokens,
  emitStyle,
  generateScopeId,
  parseStyle,
  scopeSelector,
  splitSelectorList,
  SCOPE_PREFIX,
  type AtRule,
  type Declaration,
  type StyleCompileOptions,
  type StyleCompileResult,
  type StyleNode,
  type StyleRule,
} from './style-compiler'
export {
  buildSymbolTable,
  componentName,
  resolveUnitId,
  UNIT_EXTENSION,
  type LogicInfo,
  type PropDefinition,
  type SymbolInfo,
  type SymbolKind,
  type SymbolTable,
} from './symbols'
export { parseExpression, rewriteExpression, Scope, GLOBALS, type ParsedExpression, type Reference } from './expressions'
export { analyze, detectCycles, type AnalysisResult, type AnalyzeOptions, type ComponentInterface } from './analyzer'
export { generate, DEFAULT_RUNTIME_MODULE, type GenerateOptions, type GenerateResult, type RuntimeHelper } from './codegen'

import { analyze, type ComponentInterface } from './analyzer'
import { generate } from './codegen'
import { CompileError, hasErrors, warning, type Diagnostic } from './errors'
import { tokenize, type TokenStreams } from './lexer'
import { compileStyleTokens } from './style-compiler'
import { buildSymbolTable, emptyLogic, resolveUnitId, UNIT_EXTENSION, type LogicInfo } from './symbols'
import { parseMarkup, type TemplateNode } from './template-parser'

// ---- Public types ----------------------------------------------------------

export interface CompileOptions {
  /** Unit identity, used in diagnostics and for scope-id generation. */
  unitId: string
  /** Override the scope ID for testing. */
  scopeId?: string
  /** Unknown `t-` directives are errors instead of warnings. */
  strict?: boolean
  /** Module the generated code imports runtime helpers from. */
  runtimeModule?: string
  /** Extension that replaces `.tess` in component imports of the render module. */
  componentExtension?: string
  /** Interfaces of the unit's dependencies, by unit id. */
  dependencies?: ReadonlyMap<string, ComponentInterface>
}

export interface CompileResult {
  unitId: string
  /** The render module, or `null` when any error was reported. */
  code: string | null
  /** The scoped stylesheet, or `null` without a valid style section. */
  css: string | null
  /** The scope attribute elements carry, or `null` when nothing is scoped. */
  scopeId: string | null
  /** What the unit offers to its users, or `null` when any error was reported. */
  interface: ComponentInterface | null
  /** Unit ids of the components the logic section imports. */
  dependencies: string[]
  diagnostics: Diagnostic[]
}

// ---- Main compile function -------------------------------------------------

/**
 * Compile a `.tess` single-file component.
 *
 * Never throws for problems in the unit: they are reported as diagnostics.
 * A markup error does not stop the style section from compiling, and vice
 * versa; the render module is only produced when nothing failed.
 */
export function compile(source: string, options: CompileOptions): CompileResult {
  const { unitId } = options
  const diagnostics: Diagnostic[] = []
  const result: CompileResult = {
    unitId,
    code: null,
    css: null,
    scopeId: null,
    interface: null,
    dependencies: [],
    diagnostics,
  }

  const record = (err: unknown): void => {
    if (!(err instanceof CompileError)) throw err
    diagnostics.push(err.toDiagnostic())
  }

  // 1. Split and tokenize.  Malformed sections leave nothing to work on.
  let streams: TokenStreams
  try {
    streams = tokenize(source, unitId)
  } catch (err) {
    record(err)
    return result
  }
  for (const err of streams.errors) record(err)
  const { sections } = streams
  const markupFailed = streams.errors.some((e) => e.kind === 'TemplateSyntaxError')
  const styleFailed = streams.errors.some((e) => e.kind === 'InvalidSelectorError')

  // 2. Style section.
  let scopeId: string | null = null
  if (sections.style && !styleFailed) {
    try {
      const style = compileStyleTokens(streams.style, {
        unitId,
        global: 'global' in sections.style.attrs,
        scopeId: options.scopeId,
      })
      result.css = style.css
      if (style.scoped) scopeId = style.scopeId
    } catch (err) {
      record(err)
    }
  }
  result.scopeId = scopeId

  // 3. Template section.
  let nodes: TemplateNode[] | null = null
  if (!markupFailed) {
    try {
      const parsed = parseMarkup(streams.markup, { unitId, strict: options.strict })
      diagnostics.push(...parsed.warnings)
      nodes = parsed.nodes
    } catch (err) {
      record(err)
    }
  }

  // 4. Logic section.
  let logic: LogicInfo | null = emptyLogic()
  if (sections.script) {
    try {
      logic = buildSymbolTable(sections.script.content, { unitId, base: sections.script.contentStart })
    } catch (err) {
      record(err)
      logic = null
    }
  } else {
    diagnostics.push(warning('missing-logic', unitId, 'Unit has no <script> section; it declares no props'))
  }

  if (logic) {
    result.dependencies = logic.imports
      .filter((imp) => imp.source.endsWith(UNIT_EXTENSION))
      .map((imp) => resolveUnitId(unitId, imp.source))
  }

  // 5. Semantic analysis and code generation.
  if (!nodes || !logic) return result

  const analysis = analyze(nodes, { unitId, logic, dependencies: options.dependencies })
  for (const err of analysis.errors) record(err)
  diagnostics.push(...analysis.warnings)

  if (hasErrors(diagnostics)) return result

  const generated = generate(nodes, logic, analysis, {
    unitId,
    scopeId,
    runtimeModule: options.runtimeModule,
    componentExtension: options.componentExtension,
  })
  result.code = generated.code
  result.interface = analysis.interface
  return result
}
