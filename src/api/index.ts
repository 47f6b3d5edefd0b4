#!/usr/bin/env node

/**
 * HTTP API entry point.
 *
 * Environment Variables:
 *   PORT             - Server port (default: 8001)
 *   LOG_LEVEL        - winston level (default: info)
 *   MAX_REQUEST_BODY - JSON body limit (default: 2mb)
 */

import { startServer } from './server.js';
import config from '../config/index.js';

startServer(config.apiPort).catch((error: unknown) => {
    console.error('Failed to start server:', error);
    process.exit(1);
});
