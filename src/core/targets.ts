// ─────────────────────────────────────────────────────────────
// PyForm  ·  Target Configurations
// Immutable name tables injected into the emitter, normalizer and parser
// ─────────────────────────────────────────────────────────────

export type RadicalStyle = 'call' | 'power';

export interface TargetConfig {
    name: string;
    description: string;
    /** Host function head → target callable. */
    functions: Readonly<Record<string, string>>;
    /** Host constant symbol → target expression. */
    constants: Readonly<Record<string, string>>;
    reservedWords: readonly string[];
    radical: RadicalStyle;
    radicalCall: string;
    arctan2Call: string;
    /** Heads whose target callable takes exactly two arguments; longer calls nest. */
    binaryFunctions: readonly string[];
    /** Wraps list literals; `null` emits a bare list. */
    arrayConstructor: string | null;
    infinity: string;
    nan: string;
}

const PYTHON_KEYWORDS = [
    'False', 'None', 'True', 'and', 'as', 'assert', 'async', 'await', 'break',
    'class', 'continue', 'def', 'del', 'elif', 'else', 'except', 'finally', 'for',
    'from', 'global', 'if', 'import', 'in', 'is', 'lambda', 'nonlocal', 'not', 'or',
    'pass', 'raise', 'return', 'try', 'while', 'with', 'yield',
];

const NUMPY: TargetConfig = {
    name: 'numpy',
    description: 'NumPy ufuncs under the conventional `np` alias',
    functions: {
        Sin: 'np.sin', Cos: 'np.cos', Tan: 'np.tan',
        ArcSin: 'np.arcsin', ArcCos: 'np.arccos', ArcTan: 'np.arctan',
        Sinh: 'np.sinh', Cosh: 'np.cosh', Tanh: 'np.tanh',
        ArcSinh: 'np.arcsinh', ArcCosh: 'np.arccosh', ArcTanh: 'np.arctanh',
        Log: 'np.log', Exp: 'np.exp', Sqrt: 'np.sqrt',
        Abs: 'np.abs', Sign: 'np.sign',
        Floor: 'np.floor', Ceiling: 'np.ceil', Round: 'np.round',
        Min: 'np.minimum', Max: 'np.maximum',
    },
    constants: { Pi: 'np.pi', E: 'np.e', I: '1j', Infinity: 'np.inf' },
    reservedWords: [...PYTHON_KEYWORDS, 'np'],
    radical: 'call',
    radicalCall: 'np.sqrt',
    arctan2Call: 'np.arctan2',
    binaryFunctions: ['Min', 'Max'],
    arrayConstructor: 'np.array',
    infinity: 'np.inf',
    nan: 'np.nan',
};

const MATH: TargetConfig = {
    name: 'math',
    description: 'Scalar code against the standard `math` module',
    functions: {
        Sin: 'math.sin', Cos: 'math.cos', Tan: 'math.tan',
        ArcSin: 'math.asin', ArcCos: 'math.acos', ArcTan: 'math.atan',
        Sinh: 'math.sinh', Cosh: 'math.cosh', Tanh: 'math.tanh',
        ArcSinh: 'math.asinh', ArcCosh: 'math.acosh', ArcTanh: 'math.atanh',
        Log: 'math.log', Exp: 'math.exp', Sqrt: 'math.sqrt',
        Abs: 'abs', Floor: 'math.floor', Ceiling: 'math.ceil', Round: 'round',
        Min: 'min', Max: 'max',
    },
    constants: { Pi: 'math.pi', E: 'math.e', I: '1j', Infinity: 'math.inf' },
    reservedWords: [...PYTHON_KEYWORDS, 'math'],
    radical: 'call',
    radicalCall: 'math.sqrt',
    arctan2Call: 'math.atan2',
    binaryFunctions: [],
    arrayConstructor: null,
    infinity: 'math.inf',
    nan: 'math.nan',
};

export const TARGETS: Record<string, TargetConfig> = {
    numpy: NUMPY,
    math: MATH,
};

export const DEFAULT_TARGET = NUMPY;

export function isTargetName(name: string): boolean {
    return Object.hasOwn(TARGETS, name);
}

/** Reserved words plus every undotted callable the target emits. */
export function reservedNames(target: TargetConfig): string[] {
    const callables = [...Object.values(target.functions), target.radicalCall, target.arctan2Call];
    if (target.arrayConstructor !== null) callables.push(target.arrayConstructor);
    return [...target.reservedWords, ...callables.filter(c => !c.includes('.'))];
}

export function resolveTarget(base: TargetConfig | string = DEFAULT_TARGET, overrides: Partial<TargetConfig> = {}): TargetConfig {
    const target = typeof base !== 'string' ? base : isTargetName(base) ? TARGETS[base] : undefined;
    if (!target) {
        throw new Error(`Unknown target '${String(base)}'. Available: ${Object.keys(TARGETS).join(', ')}`);
    }
    return { ...target, ...overrides };
}
