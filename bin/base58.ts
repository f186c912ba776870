#!/usr/bin/env node

import { buffer } from 'node:stream/consumers'
import { hideBin } from 'yargs/helpers'
import { run } from '../lib/cli/index.js'

process.exitCode = await run(hideBin(process.argv), {
  readStdin: () => buffer(process.stdin),
  writeStdout: data => {
    process.stdout.write(data)
  },
})
