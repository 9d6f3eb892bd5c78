#!/usr/bin/env node
import 'dotenv/config'
import process from 'node:process'
import {run} from './program.js'

process.exitCode = await run(process.argv)
