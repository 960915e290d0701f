#!/usr/bin/env node
/**
 * vfs-unpack - CLI Interface
 *
 * Command-line interface for extracting LP1C VFS game archives.
 */

import { createProgram } from './program.js';

await createProgram().parseAsync();
