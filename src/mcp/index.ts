#!/usr/bin/env node
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { AnalyzerService } from '../analyzer/analyzer-service.js';
import { createContextLogger } from '../utils/logger.js';
import config from '../config/index.js';
import { analyzeCode, analyzeCodeShape, analyzeFile, analyzeFileShape } from './tools.js';

// Logs go to stderr; stdout carries the protocol.
const logger = createContextLogger('McpServer');
const service = new AnalyzerService(logger, { excludeEntryPoints: config.excludeEntryPoints });

const server = new McpServer({
    name: 'codescope-mcp',
    version: '0.1.0',
});

server.tool(
    'analyze_code',
    'Analyze one source text for complexity, loop nesting, dead code and call dependencies.',
    analyzeCodeShape,
    async (args) => {
        logger.info(`'analyze_code' tool called for language ${args.language}`);
        return analyzeCode(service, args);
    },
);

server.tool(
    'analyze_file',
    'Analyze one source file on disk; the language is inferred from its extension unless given.',
    analyzeFileShape,
    async (args) => {
        logger.info(`'analyze_file' tool called for ${args.path}`);
        return analyzeFile(service, args);
    },
);

process.on('SIGINT', () => {
    server.close().finally(() => process.exit(0));
});
process.on('SIGTERM', () => {
    server.close().finally(() => process.exit(0));
});

async function startServer(): Promise<void> {
    const transport = new StdioServerTransport();
    await server.connect(transport);
    logger.info('Server connected to transport. Running on stdio.');
}

startServer().catch((error: unknown) => {
    logger.error('MCP server failed', { error });
    process.exitCode = 1;
});
