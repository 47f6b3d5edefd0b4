// src/analyzer/analyzer-service.ts
import winston from 'winston';
import { createContextLogger } from '../utils/logger.js';
import { ParserError } from '../utils/errors.js';
import { detectLanguage } from './language-detector.js';
import { createExtractor } from './parser.js';
import { MetricsAnalyzer } from './metrics-analyzer.js';
import { SuggestionEngine, SuggestionThresholds } from './suggestion-engine.js';
import { assembleReport } from './report-assembler.js';
import {
    AnalysisOptions,
    AnalysisOutcome,
    AnalysisRequest,
    LANGUAGE_DISPLAY_NAMES,
    SyntaxExtraction,
} from './types.js';

export interface AnalyzerServiceOptions extends AnalysisOptions {
    thresholds?: Partial<SuggestionThresholds>;
}

/**
 * Runs one analysis end to end: detect, extract, aggregate, suggest,
 * assemble. Unsupported languages and parse failures come back as failure
 * outcomes; anything else is a bug and propagates.
 */
export class AnalyzerService {
    private readonly logger: winston.Logger;
    private readonly metricsAnalyzer: MetricsAnalyzer;
    private readonly suggestionEngine: SuggestionEngine;

    constructor(logger: winston.Logger = createContextLogger('AnalyzerService'), options: AnalyzerServiceOptions = {}) {
        this.logger = logger;
        this.metricsAnalyzer = new MetricsAnalyzer(logger, { excludeEntryPoints: options.excludeEntryPoints ?? false });
        this.suggestionEngine = new SuggestionEngine(logger, options.thresholds);
    }

    analyze(request: AnalysisRequest, options: AnalysisOptions = {}): AnalysisOutcome {
        const detection = detectLanguage(request.languageTag);
        if (!detection.ok) {
            this.logger.warn(detection.error.message);
            return { ok: false, error: detection.error };
        }
        const { language } = detection;

        let extraction: SyntaxExtraction;
        try {
            extraction = createExtractor(language).extract(request.sourceText);
        } catch (error: unknown) {
            if (error instanceof ParserError) {
                const message = `Error parsing ${LANGUAGE_DISPLAY_NAMES[language]} code: ${error.message}`;
                this.logger.warn(message);
                return { ok: false, error: { kind: 'ParseError', language, message, line: error.line } };
            }
            throw error;
        }

        const metrics = this.metricsAnalyzer.aggregate(extraction, request.sourceText, options);
        const suggestions = this.suggestionEngine.generate({
            language,
            approximate: extraction.approximate,
            metrics,
        });

        this.logger.info(`Analyzed ${LANGUAGE_DISPLAY_NAMES[language]} source`, {
            functions: metrics.summary.functionCount,
            loops: metrics.summary.loopCount,
            suggestions: suggestions.length,
        });
        return { ok: true, result: assembleReport(extraction, metrics, suggestions) };
    }
}
