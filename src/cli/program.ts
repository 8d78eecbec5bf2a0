import { Command } from 'commander';
import log from 'loglevel';
import { DEFAULT_GENERATED_LENGTH, StrengthEvaluator, WordlistError, type ScoringOracle } from '../strength/index.js';
import { resolveConfig, type CliOptions } from './config.js';
import { NO_RESULTS_MESSAGE, PROGRAM_NAME, PROGRAM_VERSION } from './const.js';
import { parseLengthOption } from './input.js';
import { runInteractive, type Reporter } from './interactive.js';
import { configureLogging } from './logging.js';
import { inquirerPrompter, type Prompter } from './prompter.js';
import { CheckerSession, formatReport } from './session.js';

export interface ProgramDeps {
  reporter?: Reporter;
  prompter?: Prompter;
  oracle?: ScoringOracle;
  env?: NodeJS.ProcessEnv;
}

export function buildProgram(deps: ProgramDeps = {}): Command {
  const reporter = deps.reporter ?? log;
  const prompter = deps.prompter ?? inquirerPrompter;
  let session: CheckerSession | undefined;

  const program = new Command();
  program
    .name(PROGRAM_NAME)
    .description('Check password strength and generate passwords')
    .version(PROGRAM_VERSION)
    .option('--weak-list <path>', 'wordlist of commonly used passwords')
    .option('--no-weak-list', 'skip the weak password list')
    .option('--banned-list <path>', 'wordlist of passwords found in data leaks')
    .option('--no-banned-list', 'skip the banned password list')
    .option('--log-file <path>', 'append one line per checked password to this file')
    .option('--export <path>', 'write the results of this run as JSON')
    .option('-v, --verbose', 'log every check to the console');

  const openSession = (): CheckerSession => {
    if (session) return session;
    const config = resolveConfig(program.opts<CliOptions>(), deps.env);
    configureLogging(config);
    try {
      const evaluator = new StrengthEvaluator({
        weakWordlistPath: config.weakWordlistPath,
        bannedWordlistPath: config.bannedWordlistPath,
        oracle: deps.oracle,
      });
      session = new CheckerSession(evaluator);
    } catch (e) {
      if (e instanceof WordlistError) {
        program.error(`Failed to load wordlists: ${e.message}`, { exitCode: 1, code: 'pwcheck.wordlist' });
      }
      throw e;
    }
    return session;
  };

  program
    .command('check')
    .description('check the strength of a password')
    .argument('<password>', 'password to check')
    .action((password: string) => {
      reporter.info(formatReport(openSession().check(password)));
    });

  program
    .command('generate')
    .description('generate a random password and check it')
    .option('-l, --length <n>', 'password length', parseLengthOption, DEFAULT_GENERATED_LENGTH)
    .action((opts: { length: number }) => {
      const report = openSession().generate(opts.length);
      reporter.info(`Generated Password: ${report.password}`);
      reporter.info(formatReport(report));
    });

  program
    .command('interactive', { isDefault: true })
    .description('check and generate passwords from a menu')
    .action(async () => {
      await runInteractive(openSession(), reporter, prompter);
    });

  program.hook('postAction', async () => {
    const exportPath = program.opts<CliOptions>().export;
    if (!exportPath || !session) return;
    if (session.results.length === 0) {
      reporter.info(`${NO_RESULTS_MESSAGE} Nothing written to ${exportPath}.`);
      return;
    }
    const count = await session.exportResults(exportPath);
    reporter.info(`Exported ${count} result(s) to ${exportPath}.`);
  });

  return program;
}
