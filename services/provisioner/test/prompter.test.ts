import { describe, expect, it, vi } from 'vitest';

const prompt = vi.hoisted(() => vi.fn());

vi.mock('inquirer', () => ({ default: { prompt } }));

import { InquirerPrompter } from '../src/prompts/prompter.js';

describe('InquirerPrompter', () => {
  it('asks the question as written, with no default of its own', async () => {
    prompt.mockResolvedValueOnce({ answer: '' });

    await expect(new InquirerPrompter().input('Which port [5000]')).resolves.toBe('');
    expect(prompt).toHaveBeenCalledWith([
      { type: 'input', name: 'answer', message: 'Which port [5000]' },
    ]);
  });

  it('defaults confirmations to no', async () => {
    prompt.mockResolvedValueOnce({ answer: true });

    await expect(new InquirerPrompter().confirm('Install podman now?')).resolves.toBe(true);
    expect(prompt).toHaveBeenCalledWith([
      { type: 'confirm', name: 'answer', message: 'Install podman now?', default: false },
    ]);
  });
});
