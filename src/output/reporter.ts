import chalk from 'chalk';
import type { TranslateFailureResponse, TranslateSuccessResponse } from '../schemas/api-schemas';
import type { LanguageInfo } from '../config/languages';

export function printInstructionRow(fragmentIndex: number, newText: string) {
  const idx = `#${fragmentIndex}`.padEnd(6, ' ');
  console.log(`  ${chalk.dim(idx)}${newText.trim()}`);
}

export function printTranslationSummary(response: TranslateSuccessResponse, fragmentCount: number) {
  const { metadata } = response;
  const chunkTxt = metadata.chunkCount === 1 ? '1 chunk' : `${metadata.chunkCount} chunks`;
  const fragTxt = fragmentCount === 1 ? '1 fragment' : `${fragmentCount} fragments`;
  const via = metadata.providersUsed.length > 0 ? ` via ${metadata.providersUsed.join(', ')}` : '';
  console.log(
    `${chalk.green('✓')} Translated ${fragTxt} (${chunkTxt}) into ${chalk.bold(response.targetLanguage)}${via}.`
  );
}

export function printTranslation(response: TranslateSuccessResponse, fragmentCount: number, verbose: boolean) {
  console.log(response.translatedContent);
  console.log('');
  if (verbose) {
    for (const instruction of response.rewriteInstructions) {
      printInstructionRow(instruction.fragmentIndex, instruction.newText);
    }
    console.log('');
  }
  printTranslationSummary(response, fragmentCount);
}

export function printFailure(response: TranslateFailureResponse) {
  console.error(`${chalk.red('✖')} ${chalk.red(response.errorKind)}: ${response.error}`);
  if (response.hint) {
    console.error(`  ${chalk.dim('hint:')} ${response.hint}`);
  }
}

export function printLanguages(languages: readonly LanguageInfo[]) {
  for (const lang of languages) {
    console.log(`  ${lang.key.padEnd(12, ' ')}${chalk.dim(lang.code)}`);
  }
}
