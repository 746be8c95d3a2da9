// ─────────────────────────────────────────────────────────────
// PyForm  ·  Public API
// ─────────────────────────────────────────────────────────────

export * from './core/expr';
export * from './core/diagnostics';
export * from './core/assumptions';
export * from './core/targets';
export { normalizeIdentifier, IdentifierScope } from './core/identifiers';
export { hostForm } from './core/pretty';

export { signOf, factSignOracle, type Sign, type SignOracle } from './engine/sign';
export { combineRadicals, type CombineOptions, type CombineResult, type OddNegativePolicy } from './engine/radicals';
export { evaluate, approxEqual, spotCheck, type Complex, type Env, type SpotCheckOptions, type SpotCheckReport } from './engine/evaluator';

export { emitExpression, emitFunction, type EmitOptions, type EmitterResult } from './emitters/python';
export { parsePython, TargetSyntaxError } from './parser/python';
export { extractSignature, InMemoryDefinitionStore, type DefinitionStore, type ExtractResult } from './parser/definitions';

export { writeOutput, type OutputDestination, type WriteResult } from './bridge/output';
export { reportDiagnostics, formatDiagnostic, type Logger } from './bridge/console';

export {
    translateExpression,
    translateFunction,
    translateBatch,
    type TranslateOptions,
    type TranslationResult,
    type TranslationUnit,
    type BatchEntry,
} from './translate';
