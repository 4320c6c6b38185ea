export { parseEnvironment } from './env-parser';
export { parseTranslateOptions } from './cli-parser';
