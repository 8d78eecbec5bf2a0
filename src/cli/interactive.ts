import type log from 'loglevel';
import { DEFAULT_GENERATED_LENGTH, describeCause } from '../strength/index.js';
import { parseLengthInput } from './input.js';
import { inquirerPrompter, type Prompter } from './prompter.js';
import { formatReport, type CheckerSession } from './session.js';

export type Reporter = Pick<log.Logger, 'info' | 'error'>;

export async function runInteractive(session: CheckerSession, reporter: Reporter, prompter: Prompter = inquirerPrompter): Promise<void> {
  for (;;) {
    const choice = await prompter.menu();
    switch (choice) {
      case 'check': {
        const password = await prompter.password();
        reporter.info(formatReport(session.check(password)));
        break;
      }
      case 'generate': {
        let length = parseLengthInput(await prompter.length());
        if (length === undefined) {
          reporter.info(`Invalid length. Using default length of ${DEFAULT_GENERATED_LENGTH}.`);
          length = DEFAULT_GENERATED_LENGTH;
        }
        const report = session.generate(length);
        reporter.info(`Generated Password: ${report.password}`);
        reporter.info(formatReport(report));
        break;
      }
      case 'export': {
        const file = await prompter.exportPath();
        try {
          await session.exportResults(file);
          reporter.info(`Results exported to ${file}.`);
        } catch (e) {
          reporter.error('Export failed:', describeCause(e));
        }
        break;
      }
      case 'exit':
        reporter.info('Goodbye!');
        return;
    }
  }
}
