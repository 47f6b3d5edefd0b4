// src/analyzer/report-assembler.ts
import { FileMetrics } from './metrics-analyzer.js';
import { AnalysisResult, SuggestionRecord, SyntaxExtraction } from './types.js';

/** Merges one run's extraction, metrics and suggestions into the result record. No I/O. */
export function assembleReport(
    extraction: SyntaxExtraction,
    metrics: FileMetrics,
    suggestions: SuggestionRecord[],
): AnalysisResult {
    return {
        language: extraction.language,
        approximate: extraction.approximate,
        functions: metrics.functions,
        loops: metrics.loops,
        timeComplexity: metrics.timeComplexity,
        deadCode: metrics.deadCode,
        dependencies: metrics.dependencies,
        suggestions,
        summary: metrics.summary,
    };
}
