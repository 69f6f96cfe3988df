#!/usr/bin/env node
import 'dotenv/config'
import process from 'node:process'
import { runCli } from './cli'

process.exitCode = await runCli(process.argv.slice(2))
