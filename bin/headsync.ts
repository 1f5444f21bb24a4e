#!/usr/bin/env node
/**
 * headsync CLI - Entry Point
 */

import process from 'node:process'
import { run } from '../cli/run'

void run(process.argv.slice(2)).then((code) => {
    process.exit(code)
})
