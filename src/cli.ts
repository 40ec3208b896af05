#!/usr/bin/env node
/**
 * sidefx-web CLI
 * List and download builds through the SideFX Web API
 */

import { createProgram } from './program.js';
import { loadDotenv } from './utils/config.js';

loadDotenv();

createProgram()
    .parseAsync()
    .catch((error: unknown) => {
        console.error(error instanceof Error ? error.message : error);
        process.exit(1);
    });
