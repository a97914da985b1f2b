// ---------------------------------------------------------------------------
// errors.ts — Compiler error taxonomy and diagnostics
// ---------------------------------------------------------------------------
// Every user-facing failure of the pipeline is a `CompileError` subclass.  The
// pipeline never lets them escape `compile()`: they are converted into
// `Diagnostic` records and aggregated per unit.
// ---------------------------------------------------------------------------

import { formatLocation, type SourceLocation } from './location';

export type { SourceLocation };

export type Severity = 'error' | 'warning';

export const ERROR_KINDS = [
  'MalformedSectionError',
  'UnclosedElementError',
  'TemplateSyntaxError',
  'UnknownDirectiveError',
  'InvalidSelectorError',
  'InvalidDeclarationError',
  'LogicSyntaxError',
  'ExpressionSyntaxError',
  'UnresolvedSymbolError',
  'MissingRequiredPropError',
  'CircularDependencyError',
  'BuildError',
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

export const WARNING_CODES = ['unknown-directive', 'unknown-slot', 'missing-logic', 'cache-discarded'] as const;

export type WarningCode = (typeof WARNING_CODES)[number];

const CODES: ReadonlySet<string> = new Set([...ERROR_KINDS, ...WARNING_CODES]);

export function isDiagnosticCode(code: string): code is ErrorKind | WarningCode {
  return CODES.has(code);
}

/** A single record handed to reporters and editor integrations. */
export interface Diagnostic {
  severity: Severity;
  unitId: string;
  code: ErrorKind | WarningCode;
  message: string;
  location?: SourceLocation;
}

// ---- Error classes ----------------------------------------------------------

export interface CompileErrorDetails {
  location?: SourceLocation;
  identifier?: string;
}

export abstract class CompileError extends Error {
  abstract readonly kind: ErrorKind;
  readonly unitId: string;
  readonly location: SourceLocation | undefined;
  readonly identifier: string | undefined;
  /** The message without the `unit:line:column` prefix. */
  readonly detail: string;

  constructor(message: string, unitId: string, details: CompileErrorDetails = {}) {
    super(`${formatLocation(unitId, details.location)} ${message}`);
    this.detail = message;
    this.unitId = unitId;
    this.location = details.location;
    this.identifier = details.identifier;
  }

  toDiagnostic(): Diagnostic {
    const diagnostic: Diagnostic = {
      severity: 'error',
      unitId: this.unitId,
      code: this.kind,
      message: this.detail,
    };
    if (this.location) diagnostic.location = this.location;
    return diagnostic;
  }
}

export class MalformedSectionError extends CompileError {
  readonly kind = 'MalformedSectionError';
  override name = 'MalformedSectionError';
}

export class UnclosedElementError extends CompileError {
  readonly kind = 'UnclosedElementError';
  override name = 'UnclosedElementError';
  readonly tag: string;

  constructor(tag: string, unitId: string, location: SourceLocation) {
    super(`Unclosed element <${tag}>`, unitId, { location, identifier: tag });
    this.tag = tag;
  }
}

export class TemplateSyntaxError extends CompileError {
  readonly kind = 'TemplateSyntaxError';
  override name = 'TemplateSyntaxError';
}

export class UnknownDirectiveError extends CompileError {
  readonly kind = 'UnknownDirectiveError';
  override name = 'UnknownDirectiveError';
}

export class InvalidSelectorError extends CompileError {
  readonly kind = 'InvalidSelectorError';
  override name = 'InvalidSelectorError';
}

export class InvalidDeclarationError extends CompileError {
  readonly kind = 'InvalidDeclarationError';
  override name = 'InvalidDeclarationError';
}

export class LogicSyntaxError extends CompileError {
  readonly kind = 'LogicSyntaxError';
  override name = 'LogicSyntaxError';
}

export class ExpressionSyntaxError extends CompileError {
  readonly kind = 'ExpressionSyntaxError';
  override name = 'ExpressionSyntaxError';
}

export class UnresolvedSymbolError extends CompileError {
  readonly kind = 'UnresolvedSymbolError';
  override name = 'UnresolvedSymbolError';

  constructor(identifier: string, unitId: string, location?: SourceLocation) {
    super(`Unresolved symbol "${identifier}"`, unitId, { location, identifier });
  }
}

export class MissingRequiredPropError extends CompileError {
  readonly kind = 'MissingRequiredPropError';
  override name = 'MissingRequiredPropError';
  readonly component: string;

  constructor(prop: string, component: string, unitId: string, location?: SourceLocation) {
    super(`Missing required prop "${prop}" on <${component}>`, unitId, {
      location,
      identifier: prop,
    });
    this.component = component;
  }
}

export class CircularDependencyError extends CompileError {
  readonly kind = 'CircularDependencyError';
  override name = 'CircularDependencyError';
  readonly cycle: string[];

  /** `cycle` lists each member once, in import order. */
  constructor(cycle: string[]) {
    super(`Circular dependency: ${[...cycle, cycle[0]].join(' -> ')}`, cycle[0] ?? '<unknown>');
    this.cycle = cycle;
  }
}

/** A unit whose compilation or artifact output threw outside the pipeline. */
export class BuildError extends CompileError {
  readonly kind = 'BuildError';
  override name = 'BuildError';
}

// ---- Diagnostic helpers -----------------------------------------------------

export function warning(
  code: WarningCode,
  unitId: string,
  message: string,
  location?: SourceLocation,
): Diagnostic {
  const diagnostic: Diagnostic = { severity: 'warning', unitId, code, message };
  if (location) diagnostic.location = location;
  return diagnostic;
}

export function hasErrors(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === 'error');
}
