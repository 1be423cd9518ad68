#!/usr/bin/env node

import { Command } from 'commander'
import { createChatCommand } from './commands/chat.js'
import { createEvalCommand } from './commands/eval.js'
import { createSavingsCommand } from './commands/savings.js'
import { createSearchCommand } from './commands/search.js'

const program = new Command()

program
  .name('toolscout')
  .description('Search large tool sets with BM25L and expose them to models on demand')
  .version('0.1.0')

program.addCommand(createSearchCommand())
program.addCommand(createEvalCommand())
program.addCommand(createChatCommand())
program.addCommand(createSavingsCommand())

await program.parseAsync()
