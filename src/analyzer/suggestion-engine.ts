// src/analyzer/suggestion-engine.ts
/**
 * Turns aggregated metrics into advisory messages.
 * Rules run in a fixed order and that order is the output order; the
 * per-function rules fire once for each offending function.
 */

import winston from 'winston';
import { FileMetrics } from './metrics-analyzer.js';
import { LANGUAGE_DISPLAY_NAMES, SuggestionRecord, SupportedLanguage } from './types.js';

// =============================================================================
// Thresholds Configuration
// =============================================================================

export interface SuggestionThresholds {
    /** Functions above this cyclomatic complexity are flagged. */
    maxCyclomaticComplexity: number;
    /** Functions longer than this many lines are flagged. */
    maxFunctionLines: number;
    /** Maintainability index below this is flagged (Python only). */
    minMaintainabilityIndex: number;
    /** Comment percentage below this is flagged. */
    minCommentRatio: number;
}

export const DEFAULT_SUGGESTION_THRESHOLDS: SuggestionThresholds = {
    maxCyclomaticComplexity: 10,
    maxFunctionLines: 50,
    minMaintainabilityIndex: 60,
    minCommentRatio: 5,
};

export interface SuggestionInput {
    language: SupportedLanguage;
    approximate: boolean;
    metrics: FileMetrics;
}

export class SuggestionEngine {
    private logger: winston.Logger;
    private thresholds: SuggestionThresholds;

    constructor(logger: winston.Logger, thresholds?: Partial<SuggestionThresholds>) {
        this.logger = logger;
        this.thresholds = { ...DEFAULT_SUGGESTION_THRESHOLDS, ...thresholds };
    }

    generate({ language, approximate, metrics }: SuggestionInput): SuggestionRecord[] {
        const { summary, deadCode, functions } = metrics;
        const suggestions: SuggestionRecord[] = [];

        if (approximate) {
            suggestions.push({
                severity: 'info',
                text: `Approximate analysis: ${LANGUAGE_DISPLAY_NAMES[language]} results come from lexical pattern matching and may miss or misread constructs.`,
            });
        }
        if (summary.nestedLoops > 0) {
            suggestions.push({
                severity: 'warn',
                text: 'Nested loops detected — consider using data structures or sets for optimization.',
            });
        }
        if (summary.commentRatio < this.thresholds.minCommentRatio) {
            suggestions.push({
                severity: 'warn',
                text: 'Low comment ratio — add docstrings or comments for maintainability.',
            });
        }
        if (summary.maintainabilityIndex !== undefined && summary.maintainabilityIndex < this.thresholds.minMaintainabilityIndex) {
            suggestions.push({
                severity: 'error',
                text: 'Low maintainability — consider refactoring long or complex functions.',
            });
        }
        if (deadCode.unusedVariables && deadCode.unusedVariables.length > 0) {
            suggestions.push({
                severity: 'warn',
                text: `Unused variables detected: ${deadCode.unusedVariables.join(', ')}`,
            });
        }
        if (deadCode.unusedFunctions.length > 0) {
            suggestions.push({
                severity: 'warn',
                text: `Unused functions: ${deadCode.unusedFunctions.join(', ')} — consider removing dead code.`,
            });
        }
        for (const fn of functions) {
            if (fn.sizeLines > this.thresholds.maxFunctionLines) {
                suggestions.push({
                    severity: 'warn',
                    text: `Function '${fn.name}' is too long (${fn.sizeLines} lines) — consider splitting.`,
                });
            }
        }
        for (const fn of functions) {
            if (fn.cyclomaticComplexity > this.thresholds.maxCyclomaticComplexity) {
                suggestions.push({
                    severity: 'error',
                    text: `Function '${fn.name}' has high cyclomatic complexity (${fn.cyclomaticComplexity}) — consider refactoring.`,
                });
            }
        }

        this.logger.debug(`Generated ${suggestions.length} suggestions`);
        return suggestions;
    }
}
