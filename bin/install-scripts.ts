#!/usr/bin/env tsx

import { runCli } from '../install/cli'

process.exit(runCli(process.argv.slice(2)))
