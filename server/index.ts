#!/usr/bin/env node

import { createCLI } from './cli'

createCLI()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(error)
    process.exit(1)
  })
