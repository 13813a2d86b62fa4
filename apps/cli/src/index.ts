#!/usr/bin/env node

import { InMemoryTaskRepository } from '@todo-engine/core';
import { createProgram } from './program.js';

// One repository per process; `todo shell` keeps it alive across commands
const repo = new InMemoryTaskRepository();

const program = createProgram(repo, {
  onFailure: () => {
    process.exitCode = 1;
  },
});

await program.parseAsync();
