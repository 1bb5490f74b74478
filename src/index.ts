#!/usr/bin/env node
/**
 * nas-app-sync CLI entrypoint
 *
 * Imports and runs the CLI module, which handles its own argument parsing.
 */

import './cli.js';
