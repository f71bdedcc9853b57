/**
 * Vitest setup file
 * Keeps info/debug logging out of test output
 */

import { logger } from '../src/utils/logger.js';

logger.setLevel('warn');
