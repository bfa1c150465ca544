import { Command } from 'commander';
import { version } from '../../package.json';
import { FetchDeps, registerFetch } from './commands/fetch';

export function buildProgram(deps: FetchDeps = {}): Command {
  const program = new Command();
  program
    .name('hostglance')
    .description('Print system facts beside an ASCII banner')
    .version(version);

  registerFetch(program, deps);
  return program;
}
