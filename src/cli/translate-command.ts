import type { Command } from 'commander';
import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import { parseEnvironment, parseTranslateOptions } from '../boundaries/index';
import type { TranslateOptions } from '../schemas/cli-schemas';
import { buildProviderConfiguration, type ProviderConfiguration } from '../config/config';
import { fragmentTexts } from '../alignment/fragments';
import { handleTranslateRequest } from '../pipeline/translate-request';
import { printFailure, printTranslation } from '../output/reporter';
import { setSilentMode, setVerboseMode, debug } from '../output/logger';
import { handleUnknownError } from '../errors/index';

/*
 * Registers the 'translate' command with Commander.
 * Reads a text file, translates it and prints either the translated text or
 * the JSON response the presentation layer would receive.
 *
 * Note: process.exit is intentional in CLI commands to set proper exit codes.
 */
export function registerTranslateCommand(program: Command): void {
  program
    .command('translate')
    .description('Translate a text file, preserving fragment boundaries')
    .argument('<file>', 'text file to translate')
    .requiredOption('--to <language>', 'target language (see `languages`)')
    .option('--fragments <mode>', 'fragment boundaries: none, lines or paragraphs', 'none')
    .option('--output <format>', 'Output format: line (default) or json', 'line')
    .option('-v, --verbose', 'Enable verbose logging')
    .option('--max-chunk-chars <n>', 'override MAX_CHUNK_CHARS')
    .option('--concurrency <n>', 'override TRANSLATION_CONCURRENCY (1-8)')
    .action(async (file: string, rawOpts: unknown) => {
      let options: TranslateOptions;
      try {
        options = parseTranslateOptions(rawOpts);
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Parsing translate command options');
        console.error(`Error: ${err.message}`);
        process.exit(1);
      }

      setSilentMode(options.output === 'json');
      setVerboseMode(options.verbose);

      let configuration: ProviderConfiguration;
      try {
        configuration = buildProviderConfiguration(parseEnvironment());
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Validating environment variables');
        console.error(`Error: ${err.message}`);
        console.error('Please set these in your .env file or environment.');
        process.exit(1);
      }
      if (options.maxChunkChars !== undefined) configuration.maxChunkChars = options.maxChunkChars;
      if (options.concurrency !== undefined) configuration.concurrency = options.concurrency;

      const filePath = path.resolve(process.cwd(), file);
      if (!existsSync(filePath)) {
        console.error(`Error: file does not exist: ${file}`);
        process.exit(1);
      }

      let content: string;
      try {
        content = readFileSync(filePath, 'utf-8');
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Reading input file');
        console.error(`Error: ${err.message}`);
        process.exit(1);
      }

      const fragments = fragmentTexts(content, options.fragments);
      debug(`Providers in priority order: ${configuration.providers.map((p) => p.type).join(', ') || 'none'}`);

      const response = await handleTranslateRequest(
        { content, targetLanguage: options.to, ...(fragments.length > 0 && { fragments }) },
        configuration
      );

      if (options.output === 'json') {
        console.log(JSON.stringify(response, null, 2));
      } else if (response.success) {
        printTranslation(response, fragments.length, options.verbose);
      } else {
        printFailure(response);
      }

      process.exit(response.success ? 0 : 1);
    });
}
