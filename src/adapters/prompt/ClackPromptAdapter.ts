import * as clack from '@clack/prompts';
import type { PromptDefinition, PromptSource } from '../../ports/PromptPort.js';
import { PromptError } from '../../utils/errors.js';

/** Asks each prompt in turn on the terminal. Empty answers are kept as ''. */
export class ClackPromptAdapter implements PromptSource {
  async ask(title: string, prompts: readonly PromptDefinition[]): Promise<string[]> {
    clack.intro(title);
    const answers: string[] = [];
    for (const prompt of prompts) {
      const result = await clack.text({
        message: prompt.label,
        placeholder: prompt.hint,
        defaultValue: '',
      });
      if (clack.isCancel(result)) {
        clack.cancel('Entry discarded.');
        throw new PromptError(`Prompting cancelled at "${prompt.label}"`);
      }
      answers.push(typeof result === 'string' ? result.trim() : '');
    }
    return answers;
  }

  note(message: string): void {
    clack.log.info(message);
  }
}
