// src/analyzer/types.ts

// --- Languages ---

export type SupportedLanguage = 'python' | 'java' | 'javascript' | 'c' | 'cpp';

/** Human-readable names used in reports, errors and suggestions. */
export const LANGUAGE_DISPLAY_NAMES: Record<SupportedLanguage, string> = {
    python: 'Python',
    java: 'Java',
    javascript: 'JavaScript',
    c: 'C',
    cpp: 'C++',
};

// --- Per-unit records ---

export interface FunctionRecord {
    name: string;
    startLine: number;            // 1-based
    endLine: number;              // >= startLine
    cyclomaticComplexity: number; // >= 1
    sizeLines: number;            // endLine - startLine
}

export interface LoopRecord {
    line: number;
    nestingDepth: number; // 1 = outermost loop
}

export interface TimeComplexityEstimate {
    functionName: string;
    /** "O(1)", "O(n)", "O(n²)" or "O(n^k)" for k >= 3. */
    label: string;
    line: number;
}

export interface DeadCodeSet {
    /** Sorted. Absent when the extractor does not track variables (lexical analysis). */
    unusedVariables?: string[];
    /** Sorted. */
    unusedFunctions: string[];
}

/**
 * Caller -> callees, in call order. Every declared function has a key, even
 * with no callees; same-named functions share one key. Callees may be
 * functions that are not declared in the file (builtins, library calls).
 */
export type DependencyGraph = Record<string, string[]>;

export type SuggestionSeverity = 'info' | 'warn' | 'error';

export interface SuggestionRecord {
    severity: SuggestionSeverity;
    text: string;
}

export type EfficiencyGrade = 'A' | 'B' | 'C' | 'D';

export interface AnalysisSummary {
    totalLines: number;
    commentLines: number;
    /** Percentage, two decimals. */
    commentRatio: number;
    /** Mean cyclomatic complexity over all functions, two decimals; 0 with no functions. */
    averageComplexity: number;
    efficiencyGrade: EfficiencyGrade;
    functionCount: number;
    largestFunction: { name: string; sizeLines: number };
    loopCount: number;
    /** Loops at nesting depth 2 or more. */
    nestedLoops: number;
    /** Present for Python only. */
    maintainabilityIndex?: number;
}

export interface AnalysisResult {
    language: SupportedLanguage;
    /** True when results come from lexical pattern matching instead of a syntax tree. */
    approximate: boolean;
    functions: FunctionRecord[];
    loops: LoopRecord[];
    timeComplexity: TimeComplexityEstimate[];
    deadCode: DeadCodeSet;
    dependencies: DependencyGraph;
    suggestions: SuggestionRecord[];
    summary: AnalysisSummary;
}

// --- Requests and outcomes ---

export interface AnalysisRequest {
    sourceText: string;
    languageTag: string;
}

export interface AnalysisOptions {
    /** Never report `main` as an unused function. */
    excludeEntryPoints?: boolean;
}

export interface UnsupportedLanguageFailure {
    kind: 'UnsupportedLanguage';
    languageTag: string;
    message: string;
}

export interface ParseFailure {
    kind: 'ParseError';
    language: SupportedLanguage;
    message: string;
    line?: number;
}

export type AnalysisFailure = UnsupportedLanguageFailure | ParseFailure;

export type AnalysisOutcome =
    | { ok: true; result: AnalysisResult }
    | { ok: false; error: AnalysisFailure };

// --- Extraction (parser output) ---

/** A function as seen by an extractor, before metrics are derived. */
export interface ExtractedFunction {
    name: string;
    startLine: number;
    endLine: number;
    cyclomaticComplexity: number;
    /** Deepest loop nesting inside the function, counted from the function itself. */
    maxLoopDepth: number;
}

/**
 * Everything a language extractor pulls out of one source text. Produced by
 * one pass over the syntax tree (or over the token stream for lexical
 * languages) and consumed by the metrics analyzer.
 */
export interface SyntaxExtraction {
    language: SupportedLanguage;
    approximate: boolean;
    /** In declaration order. */
    functions: ExtractedFunction[];
    /** In source order. */
    loops: LoopRecord[];
    dependencies: Map<string, string[]>;
    /** Call targets anywhere in the file, not counting a function's calls to itself. */
    calledFunctions: ReadonlySet<string>;
    /** Absent when variables are not tracked. */
    assignedVariables?: ReadonlySet<string>;
    readVariables?: ReadonlySet<string>;
}

export interface SyntaxExtractor {
    readonly language: SupportedLanguage;
    /** @throws ParserError when the text is not syntactically valid. */
    extract(sourceText: string): SyntaxExtraction;
}
