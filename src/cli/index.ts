#!/usr/bin/env node
/**
 * company-intel CLI
 *
 * Commands:
 *   discovery      - statements, executives, ownership (+ acquirer follow-up)
 *   revenue        - revenue estimates and confidence
 *   deep-analysis  - video / article deep reads
 */

import "dotenv/config";
import { buildProgram } from "./program.js";
import { defaultCliEnv } from "./shared.js";

await buildProgram(defaultCliEnv()).parseAsync(process.argv);
