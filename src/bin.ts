#!/usr/bin/env node
import { handleCliError, runCli } from './cli.js'

runCli(process.argv).catch(handleCliError)
