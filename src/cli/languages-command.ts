import type { Command } from 'commander';
import { SUPPORTED_LANGUAGES } from '../config/languages';
import { printLanguages } from '../output/reporter';

export function registerLanguagesCommand(program: Command): void {
  program
    .command('languages')
    .description('List supported target languages')
    .action(() => {
      printLanguages(SUPPORTED_LANGUAGES);
    });
}
