import { Command } from 'commander';
import { createContextLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { startServer } from '../api/server.js';
import config from '../config/index.js';

const logger = createContextLogger('ServeCmd');

interface ServeOptions {
    port: string;
}

export function registerServeCommand(program: Command): void {
    program
        .command('serve')
        .description('Start the codescope HTTP API server')
        .option('-p, --port <port>', 'Port to run the server on', String(config.apiPort))
        .action(async (options: ServeOptions) => {
            const port = parseInt(options.port, 10);
            if (!Number.isInteger(port) || port <= 0) {
                logger.error(`Invalid port: ${options.port}`);
                process.exitCode = 1;
                return;
            }

            logger.info(`Starting API server on port ${port}...`);

            try {
                await startServer(port);
            } catch (error: unknown) {
                logger.error(`Failed to start server: ${errorMessage(error)}`);
                process.exitCode = 1;
            }
        });
}
