// ─────────────────────────────────────────────────────────────
// PyForm  ·  Diagnostics
// Structured, recoverable findings returned by every component
// ─────────────────────────────────────────────────────────────

import type { Expr } from './expr';

export type Severity = 'error' | 'warning' | 'info';

interface DiagnosticBase {
    severity: Severity;
    message: string;
}

export type Diagnostic =
    | UnknownSigns
    | SuggestAssumptions
    | OddNegativeBases
    | NoDefinitionFound
    | UnmappedFunction
    | AmbiguousSignature
    | IdentifierCollision
    | WriteFailure;

export interface UnknownSigns extends DiagnosticBase {
    kind: 'UnknownSigns';
    expressions: Expr[];
}

export interface SuggestAssumptions extends DiagnosticBase {
    kind: 'SuggestAssumptions';
    suggestions: string[];
}

export interface OddNegativeBases extends DiagnosticBase {
    kind: 'OddNegativeBases';
    expressions: Expr[];
}

export interface NoDefinitionFound extends DiagnosticBase {
    kind: 'NoDefinitionFound';
    symbol: string;
}

export interface UnmappedFunction extends DiagnosticBase {
    kind: 'UnmappedFunction';
    name: string;
}

export interface AmbiguousSignature extends DiagnosticBase {
    kind: 'AmbiguousSignature';
    name: string;
    duplicates: string[];
}

export interface IdentifierCollision extends DiagnosticBase {
    kind: 'IdentifierCollision';
    identifier: string;
    names: string[];
}

export interface WriteFailure extends DiagnosticBase {
    kind: 'WriteFailure';
    path: string;
    reason: string;
}

export type DiagnosticKind = Diagnostic['kind'];

export function hasErrors(diagnostics: readonly Diagnostic[]): boolean {
    return diagnostics.some(d => d.severity === 'error');
}

export function ofKind<K extends DiagnosticKind>(
    diagnostics: readonly Diagnostic[],
    kind: K,
): Extract<Diagnostic, { kind: K }>[] {
    return diagnostics.filter((d): d is Extract<Diagnostic, { kind: K }> => d.kind === kind);
}
