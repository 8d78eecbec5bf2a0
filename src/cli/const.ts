import { fileURLToPath } from 'node:url';
import { MAX_GENERATED_LENGTH } from '../strength/const.js';

export const PROGRAM_NAME = 'pwcheck';
export const PROGRAM_VERSION = '0.1.0';
export const CHECKER_LOGGER = 'checker';

export const BUNDLED_WEAK_LIST = fileURLToPath(new URL('../../wordlists/weak_passwords.txt', import.meta.url));
export const BUNDLED_BANNED_LIST = fileURLToPath(new URL('../../wordlists/banned_passwords.txt', import.meta.url));

export const ENV_WEAK_LIST = 'PWCHECK_WEAK_LIST';
export const ENV_BANNED_LIST = 'PWCHECK_BANNED_LIST';
export const ENV_LOG_FILE = 'PWCHECK_LOG_FILE';

export const EXPORT_JSON_INDENT = 4;

export const NO_RESULTS_MESSAGE = 'No results to export.';
export const INVALID_LENGTH_MESSAGE = `Length must be a positive integer no greater than ${MAX_GENERATED_LENGTH}.`;
