// src/report/report-writer.ts
import fs from 'fs/promises';
import path from 'path';
import { createContextLogger } from '../utils/logger.js';
import { ReportWriteError } from '../utils/errors.js';
import { AnalysisResult, LANGUAGE_DISPLAY_NAMES } from '../analyzer/types.js';

const logger = createContextLogger('ReportWriter');

/** A function is critical above either limit. */
export const CRITICAL_COMPLEXITY = 10;
export const CRITICAL_SIZE_LINES = 20;

const BAR_NAME_WIDTH = 20;
const BAR_MIN_WIDTH = 2;

function pad(value: number): string {
    return String(value).padStart(2, '0');
}

/** `analysis_report_YYYY-MM-DD_HH-MM-SS.txt`, in local time. */
export function reportFileName(date: Date): string {
    const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
    const time = `${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`;
    return `analysis_report_${day}_${time}.txt`;
}

function list(items: string[]): string {
    return items.length > 0 ? items.join(', ') : 'None';
}

/** Renders a result as the plain-text report shown by the CLI and saved by `--report`. */
export function renderReport(result: AnalysisResult): string {
    const { summary, functions } = result;
    const lines: string[] = [];

    lines.push(`Language Detected: ${LANGUAGE_DISPLAY_NAMES[result.language]}`);
    if (result.approximate) {
        lines.push('(approximate: lexical analysis)');
    }
    lines.push('');

    const critical = functions.filter(fn => fn.cyclomaticComplexity > CRITICAL_COMPLEXITY || fn.sizeLines > CRITICAL_SIZE_LINES);
    if (critical.length > 0) {
        lines.push('Critical Functions:');
        for (const fn of critical) {
            lines.push(`  ${fn.name} (line ${fn.startLine}): complexity ${fn.cyclomaticComplexity}, ${fn.sizeLines} lines`);
        }
    } else {
        lines.push('No critical functions detected.');
    }
    lines.push('');

    lines.push('Function Complexity Graph:');
    if (functions.length === 0) {
        lines.push('  (no functions)');
    }
    for (const fn of functions) {
        const bar = '█'.repeat(Math.max(BAR_MIN_WIDTH, fn.cyclomaticComplexity));
        lines.push(`  ${fn.name.padEnd(BAR_NAME_WIDTH)} | ${bar} ${fn.cyclomaticComplexity}`);
    }
    lines.push('');

    lines.push('Time Complexity Estimation:');
    if (result.timeComplexity.length === 0) {
        lines.push('  (no functions)');
    }
    for (const estimate of result.timeComplexity) {
        lines.push(`  ${estimate.functionName} (line ${estimate.line}): ${estimate.label}`);
    }
    lines.push('');

    lines.push('--- Analysis Report ---');
    lines.push(`Maintainability Index: ${summary.maintainabilityIndex ?? 'N/A'}`);
    lines.push(`Comment Lines: ${summary.commentLines} (${summary.commentRatio}%)`);
    lines.push(`Average Complexity: ${summary.averageComplexity}`);
    lines.push(`Total Lines: ${summary.totalLines}`);
    lines.push(`Number of Functions: ${summary.functionCount}`);
    lines.push(`Largest Function: ${summary.largestFunction.name} (${summary.largestFunction.sizeLines} lines)`);
    lines.push(`Efficiency Grade: ${summary.efficiencyGrade}`);
    lines.push(`Loops Detected: ${summary.loopCount}`);
    lines.push(`Nested Loops: ${summary.nestedLoops}`);
    lines.push('');

    lines.push('Dead Code:');
    lines.push(`  Unused Variables: ${result.deadCode.unusedVariables ? list(result.deadCode.unusedVariables) : 'not tracked'}`);
    lines.push(`  Unused Functions: ${list(result.deadCode.unusedFunctions)}`);
    lines.push('');

    lines.push('Suggestions:');
    if (result.suggestions.length === 0) {
        lines.push('  None');
    }
    for (const suggestion of result.suggestions) {
        lines.push(`  [${suggestion.severity.toUpperCase()}] ${suggestion.text}`);
    }

    return `${lines.join('\n')}\n`;
}

/**
 * Writes the rendered report into `directory` (created if needed) and
 * returns the file's path.
 */
export async function writeReport(result: AnalysisResult, directory: string, date: Date = new Date()): Promise<string> {
    const filePath = path.join(directory, reportFileName(date));
    try {
        await fs.mkdir(directory, { recursive: true });
        await fs.writeFile(filePath, renderReport(result), 'utf-8');
    } catch (error: unknown) {
        throw new ReportWriteError(`Failed to write report to ${filePath}`, { originalError: error });
    }
    logger.info(`Report saved to ${filePath}`);
    return filePath;
}
