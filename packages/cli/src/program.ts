import { Command } from 'commander'
import pkg from '../package.json'
import { registerExportCommand } from './commands/export'

export function createProgram(): Command {
  const program = new Command()
  program
    .name('gmlkit')
    .description('Export graphs to GML (Graph Modeling Language)')
    .version(pkg.version)

  registerExportCommand(program)
  return program
}
