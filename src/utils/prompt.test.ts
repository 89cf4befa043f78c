import inquirer from 'inquirer';
import { describe, expect, it, vi } from 'vitest';
import { promptCredentials } from './prompt.js';

vi.mock('inquirer', () => ({
  default: { prompt: vi.fn() },
}));

type PromptQuestion = { name: string; type: string; mask?: string; when: () => boolean };

function isQuestionList(value: unknown): value is PromptQuestion[] {
  return (
    Array.isArray(value) &&
    value.every((q) => typeof q === 'object' && q !== null && 'name' in q && 'when' in q && typeof q.when === 'function')
  );
}

/** Questions whose `when` guard lets them through, as `type:name` */
function askedQuestions(): string[] {
  const questions: unknown = vi.mocked(inquirer.prompt).mock.calls[0]?.[0];
  if (!isQuestionList(questions)) return [];
  return questions.filter((q) => q.when()).map((q) => `${q.type}:${q.name}`);
}

describe('promptCredentials', () => {
  it('should ask for both fields with a masked password', async () => {
    vi.mocked(inquirer.prompt).mockResolvedValueOnce({ username: 'student', password: 'test-secret' });

    const credentials = await promptCredentials();

    expect(credentials).toEqual({ username: 'student', password: 'test-secret' });
    expect(askedQuestions()).toEqual(['input:username', 'password:password']);
  });

  it('should skip fields the configuration already provides', async () => {
    vi.mocked(inquirer.prompt).mockResolvedValueOnce({ password: 'test-secret' });

    const credentials = await promptCredentials({ username: 'configured' });

    expect(credentials).toEqual({ username: 'configured', password: 'test-secret' });
    expect(askedQuestions()).toEqual(['password:password']);
  });
});
