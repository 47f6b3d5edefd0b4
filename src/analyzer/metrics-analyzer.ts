// src/analyzer/metrics-analyzer.ts
/**
 * Language-agnostic code metrics.
 * Turns a SyntaxExtraction plus the raw source text into per-function
 * records, dead-code sets and the file-level summary.
 */

import winston from 'winston';
import {
    AnalysisSummary,
    DeadCodeSet,
    DependencyGraph,
    EfficiencyGrade,
    FunctionRecord,
    LoopRecord,
    SupportedLanguage,
    SyntaxExtraction,
    TimeComplexityEstimate,
} from './types.js';

/** Functions that are called by the runtime rather than by the file itself. */
export const ENTRY_POINT_NAMES: ReadonlySet<string> = new Set(['main']);

export interface MetricsOptions {
    /** Leave entry points out of the unused-function list. */
    excludeEntryPoints: boolean;
}

export interface FileMetrics {
    functions: FunctionRecord[];
    loops: LoopRecord[];
    timeComplexity: TimeComplexityEstimate[];
    deadCode: DeadCodeSet;
    dependencies: DependencyGraph;
    summary: AnalysisSummary;
}

// =============================================================================
// Text-Based Metrics (Language Agnostic)
// =============================================================================

export function roundTo(value: number, digits: number): number {
    const factor = 10 ** digits;
    return Math.round(value * factor) / factor;
}

/**
 * Splits text into lines the way a line-oriented reader counts them:
 * `\n`, `\r\n` and `\r` all end a line, a trailing terminator does not open
 * another one, and empty text has no lines.
 */
export function splitSourceLines(sourceText: string): string[] {
    if (sourceText === '') return [];
    const lines = sourceText.split(/\r\n|\r|\n/);
    if (lines[lines.length - 1] === '') lines.pop();
    return lines;
}

export function isCommentLine(line: string, language: SupportedLanguage): boolean {
    const trimmed = line.trim();
    if (language === 'python') {
        return trimmed.startsWith('#');
    }
    return trimmed.startsWith('//') || trimmed.startsWith('/*') || trimmed.startsWith('*');
}

/**
 * Estimate cyclomatic complexity from source text.
 * Used for languages analysed without a syntax tree; the text should
 * already have comments and literals blanked out.
 */
export function estimateCyclomaticComplexityFromText(sourceText: string): number {
    let complexity = 1; // Base complexity

    const patterns = [
        /\bif\b/g,
        /\bfor\b/g,
        /\bwhile\b/g, // also the tail of do-while, so `do` itself is not counted
        /\bcase\b/g,
        /\bcatch\b/g,
        /\?/g,        // Ternary operator
        /&&/g,
        /\|\|/g,
    ];

    for (const pattern of patterns) {
        const matches = sourceText.match(pattern);
        if (matches) {
            complexity += matches.length;
        }
    }

    return complexity;
}

/**
 * Maintainability index on a 0-100 scale from average cyclomatic complexity,
 * line count and comment percentage. The Halstead volume term of the classic
 * formula is left out; a file with no lines scores 100.
 */
export function computeMaintainabilityIndex(totalLines: number, commentRatio: number, averageComplexity: number): number {
    if (totalLines <= 0) {
        return 100;
    }
    const commentRadians = (commentRatio * Math.PI) / 180;
    const raw = 171
        - 0.23 * averageComplexity
        - 16.2 * Math.log(totalLines)
        + 50 * Math.sin(Math.sqrt(2.46 * commentRadians));
    const scaled = (raw * 100) / 171;
    return roundTo(Math.min(100, Math.max(0, scaled)), 2);
}

export function timeComplexityLabel(loopDepth: number): string {
    if (loopDepth <= 0) return 'O(1)';
    if (loopDepth === 1) return 'O(n)';
    if (loopDepth === 2) return 'O(n²)';
    return `O(n^${loopDepth})`;
}

export function efficiencyGrade(averageComplexity: number): EfficiencyGrade {
    if (averageComplexity <= 5) return 'A';
    if (averageComplexity <= 10) return 'B';
    if (averageComplexity <= 15) return 'C';
    return 'D';
}

function sortedDifference(left: ReadonlySet<string>, right: ReadonlySet<string>): string[] {
    return [...left].filter(name => !right.has(name)).sort();
}

// =============================================================================
// Metrics Analyzer Class
// =============================================================================

export class MetricsAnalyzer {
    private logger: winston.Logger;
    private options: MetricsOptions;

    constructor(logger: winston.Logger, options?: Partial<MetricsOptions>) {
        this.logger = logger;
        this.options = { excludeEntryPoints: false, ...options };
    }

    aggregate(extraction: SyntaxExtraction, sourceText: string, options?: Partial<MetricsOptions>): FileMetrics {
        const effective: MetricsOptions = {
            excludeEntryPoints: options?.excludeEntryPoints ?? this.options.excludeEntryPoints,
        };

        const functions: FunctionRecord[] = extraction.functions.map(fn => ({
            name: fn.name,
            startLine: fn.startLine,
            endLine: fn.endLine,
            cyclomaticComplexity: fn.cyclomaticComplexity,
            sizeLines: fn.endLine - fn.startLine,
        }));

        const timeComplexity: TimeComplexityEstimate[] = extraction.functions.map(fn => ({
            functionName: fn.name,
            label: timeComplexityLabel(fn.maxLoopDepth),
            line: fn.startLine,
        }));

        const deadCode = this.findDeadCode(extraction, effective);
        const summary = this.summarize(extraction, functions, sourceText);

        this.logger.debug('Aggregated file metrics', {
            language: extraction.language,
            functions: functions.length,
            loops: extraction.loops.length,
            averageComplexity: summary.averageComplexity,
        });

        return {
            functions,
            loops: extraction.loops.map(loop => ({ ...loop })),
            timeComplexity,
            deadCode,
            dependencies: Object.fromEntries(extraction.dependencies),
            summary,
        };
    }

    private findDeadCode(extraction: SyntaxExtraction, options: MetricsOptions): DeadCodeSet {
        const declared = new Set(extraction.functions.map(fn => fn.name));
        let unusedFunctions = sortedDifference(declared, extraction.calledFunctions);
        if (options.excludeEntryPoints) {
            unusedFunctions = unusedFunctions.filter(name => !ENTRY_POINT_NAMES.has(name));
        }

        const deadCode: DeadCodeSet = { unusedFunctions };
        if (extraction.assignedVariables && extraction.readVariables) {
            deadCode.unusedVariables = sortedDifference(extraction.assignedVariables, extraction.readVariables);
        }
        return deadCode;
    }

    private summarize(extraction: SyntaxExtraction, functions: FunctionRecord[], sourceText: string): AnalysisSummary {
        const lines = splitSourceLines(sourceText);
        const totalLines = lines.length;
        const commentLines = lines.filter(line => isCommentLine(line, extraction.language)).length;
        const commentRatio = totalLines > 0 ? roundTo((commentLines / totalLines) * 100, 2) : 0;

        const totalComplexity = functions.reduce((sum, fn) => sum + fn.cyclomaticComplexity, 0);
        const averageComplexity = functions.length > 0 ? roundTo(totalComplexity / functions.length, 2) : 0;

        // First function wins a tie
        const largestFunction = functions.reduce(
            (largest, fn) => (fn.sizeLines > largest.sizeLines ? { name: fn.name, sizeLines: fn.sizeLines } : largest),
            functions.length > 0
                ? { name: functions[0].name, sizeLines: functions[0].sizeLines }
                : { name: 'None', sizeLines: 0 },
        );

        const summary: AnalysisSummary = {
            totalLines,
            commentLines,
            commentRatio,
            averageComplexity,
            efficiencyGrade: efficiencyGrade(averageComplexity),
            functionCount: functions.length,
            largestFunction,
            loopCount: extraction.loops.length,
            nestedLoops: extraction.loops.filter(loop => loop.nestingDepth >= 2).length,
        };
        if (extraction.language === 'python') {
            summary.maintainabilityIndex = computeMaintainabilityIndex(totalLines, commentRatio, averageComplexity);
        }
        return summary;
    }
}
