#!/usr/bin/env tsx

import { createProgram } from './program.js';
import { palette } from './output.js';

createProgram({ env: process.env, palette }).parse();
