// src/mcp/tools.ts
import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { AnalyzerService } from '../analyzer/analyzer-service.js';
import { languageFromPath } from '../analyzer/language-detector.js';
import { renderReport } from '../report/report-writer.js';
import { errorMessage } from '../utils/errors.js';

export const analyzeCodeShape = {
    sourceText: z.string().describe('The full source text of one file.'),
    language: z.string().describe('python | java | js | javascript | c | cpp'),
    format: z.enum(['json', 'text']).optional().describe('Result format (default: json).'),
    excludeEntryPoints: z.boolean().optional().describe('Never list main() among unused functions.'),
};

export const analyzeFileShape = {
    path: z.string().describe('Path of the source file to analyze.'),
    language: z.string().optional().describe('Language tag; inferred from the extension when omitted.'),
    format: z.enum(['json', 'text']).optional().describe('Result format (default: json).'),
    excludeEntryPoints: z.boolean().optional().describe('Never list main() among unused functions.'),
};

const AnalyzeCodeArgs = z.object(analyzeCodeShape);
const AnalyzeFileArgs = z.object(analyzeFileShape);

export type AnalyzeCodeArgs = z.infer<typeof AnalyzeCodeArgs>;
export type AnalyzeFileArgs = z.infer<typeof AnalyzeFileArgs>;

export interface ToolResult {
    [key: string]: unknown;
    content: Array<{ type: 'text'; text: string }>;
    isError?: boolean;
}

function textResult(text: string, isError = false): ToolResult {
    return isError ? { content: [{ type: 'text', text }], isError } : { content: [{ type: 'text', text }] };
}

export function analyzeCode(service: AnalyzerService, args: AnalyzeCodeArgs): ToolResult {
    const outcome = service.analyze(
        { sourceText: args.sourceText, languageTag: args.language },
        { excludeEntryPoints: args.excludeEntryPoints },
    );
    if (!outcome.ok) {
        return textResult(outcome.error.message, true);
    }
    return textResult(args.format === 'text' ? renderReport(outcome.result) : JSON.stringify(outcome.result, null, 2));
}

export async function analyzeFile(service: AnalyzerService, args: AnalyzeFileArgs): Promise<ToolResult> {
    const filePath = path.resolve(args.path);
    const language = args.language ?? languageFromPath(filePath);
    if (!language) {
        return textResult(`Cannot infer the language of ${filePath}; pass a language tag.`, true);
    }

    let sourceText: string;
    try {
        sourceText = await fs.readFile(filePath, 'utf-8');
    } catch (error: unknown) {
        return textResult(`Cannot read ${filePath}: ${errorMessage(error)}`, true);
    }
    return analyzeCode(service, {
        sourceText,
        language,
        format: args.format,
        excludeEntryPoints: args.excludeEntryPoints,
    });
}
