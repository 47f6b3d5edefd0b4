import { Command } from 'commander';
import fs from 'fs/promises';
import path from 'path';
import { createContextLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { AnalyzerService } from '../analyzer/analyzer-service.js';
import { languageFromPath } from '../analyzer/language-detector.js';
import { renderReport, writeReport } from '../report/report-writer.js';
import { toDot } from '../report/dependency-graph.js';
import config from '../config/index.js';

const logger = createContextLogger('AnalyzeCmd');

interface AnalyzeOptions {
    language?: string;
    json?: boolean;
    report?: boolean;
    reportDir: string;
    graph?: string;
    excludeEntryPoints?: boolean;
}

export function registerAnalyzeCommand(program: Command): void {
    program
        .command('analyze <file>')
        .description('Analyze a single Python, Java, JavaScript, C or C++ source file.')
        .option('-l, --language <tag>', 'python | java | js | javascript | c | cpp (default: inferred from the file extension)')
        .option('--json', 'Print the analysis result as JSON instead of the text report', false)
        .option('--report', 'Save the text report as analysis_report_<timestamp>.txt', false)
        .option('--report-dir <dir>', 'Directory for saved reports', config.reportDirectory)
        .option('--graph <file>', 'Write the function dependency graph as Graphviz DOT')
        .option('--exclude-entry-points', 'Never list main() among unused functions', config.excludeEntryPoints)
        .action(async (file: string, options: AnalyzeOptions) => {
            const filePath = path.resolve(file);
            logger.info(`Received analyze command for: ${filePath}`);

            const languageTag = options.language ?? languageFromPath(filePath);
            if (!languageTag) {
                logger.error(`Cannot infer the language of ${file}; pass --language`);
                process.exitCode = 1;
                return;
            }

            try {
                const sourceText = await fs.readFile(filePath, 'utf-8');
                const service = new AnalyzerService();
                const outcome = service.analyze(
                    { sourceText, languageTag },
                    { excludeEntryPoints: options.excludeEntryPoints },
                );

                if (!outcome.ok) {
                    logger.error(outcome.error.message);
                    if (options.json) {
                        process.stdout.write(`${JSON.stringify({ error: outcome.error }, null, 2)}\n`);
                    }
                    process.exitCode = 1;
                    return;
                }

                const { result } = outcome;
                process.stdout.write(options.json ? `${JSON.stringify(result, null, 2)}\n` : renderReport(result));

                if (options.report) {
                    await writeReport(result, path.resolve(options.reportDir));
                }
                if (options.graph) {
                    const graphPath = path.resolve(options.graph);
                    await fs.writeFile(graphPath, toDot(result.dependencies, path.basename(filePath)), 'utf-8');
                    logger.info(`Dependency graph written to ${graphPath}`);
                }
            } catch (error: unknown) {
                logger.error(`Analysis command failed: ${errorMessage(error)}`, {
                    stack: error instanceof Error ? error.stack : undefined,
                });
                process.exitCode = 1;
            }
        });
}
