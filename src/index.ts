#!/usr/bin/env node
/**
 * hostsync CLI entrypoint
 */

import { createProgram } from './cli.js';

createProgram().parse();
