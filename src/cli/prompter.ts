import inquirer from 'inquirer';

export type MenuChoice = 'check' | 'generate' | 'export' | 'exit';

export interface Prompter {
  menu(): Promise<MenuChoice>;
  password(): Promise<string>;
  length(): Promise<string>;
  exportPath(): Promise<string>;
}

export const inquirerPrompter: Prompter = {
  async menu() {
    const { choice } = await inquirer.prompt<{ choice: MenuChoice }>([
      {
        type: 'list',
        name: 'choice',
        message: 'Password Strength Checker',
        choices: [
          { name: 'Check Password Strength', value: 'check' },
          { name: 'Generate Strong Password', value: 'generate' },
          { name: 'Export Results', value: 'export' },
          { name: 'Exit', value: 'exit' },
        ],
      },
    ]);
    return choice;
  },

  async password() {
    const { password } = await inquirer.prompt<{ password: string }>([
      { type: 'password', name: 'password', message: 'Enter password to check', mask: '*' },
    ]);
    return password;
  },

  async length() {
    const { length } = await inquirer.prompt<{ length: string }>([
      { type: 'input', name: 'length', message: 'Enter desired password length (default 16)' },
    ]);
    return length;
  },

  async exportPath() {
    const { file } = await inquirer.prompt<{ file: string }>([
      { type: 'input', name: 'file', message: 'Export results to', default: 'password_results.json' },
    ]);
    return file;
  },
};
