#!/usr/bin/env node
/**
 * merkle-attest CLI entry point
 */

import { createProgram } from './program.js';

createProgram().parse();
