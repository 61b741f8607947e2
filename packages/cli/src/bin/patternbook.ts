#!/usr/bin/env node
/**
 * patternbook CLI entry point
 *
 * Usage:
 *   patternbook list
 *   patternbook describe <pattern-id>
 *   patternbook run <pattern-id> [input]
 */

import { createProgram } from '../program.js';

createProgram().parse(process.argv);
