import inquirer from 'inquirer';
import type { Credentials } from '../types/course.types.js';

type CredentialAnswers = {
  username?: string;
  password?: string;
};

/**
 * Ask for whichever credentials the configuration does not already supply
 */
export async function promptCredentials(known: Partial<Credentials> = {}): Promise<Credentials> {
  const answers = await inquirer.prompt<CredentialAnswers>([
    {
      type: 'input',
      name: 'username',
      message: 'Enter your username:',
      when: () => !known.username,
    },
    {
      type: 'password',
      name: 'password',
      message: 'Enter your password:',
      mask: '*',
      when: () => !known.password,
    },
  ]);

  return {
    username: known.username ?? answers.username ?? '',
    password: known.password ?? answers.password ?? '',
  };
}
