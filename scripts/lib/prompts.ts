import { input as inputPrompt } from '@inquirer/prompts';

export interface PromptAdapter {
  input(options: { message: string; defaultValue?: string }): Promise<string>;
}

export const interactivePromptAdapter: PromptAdapter = {
  async input(options) {
    const value = await inputPrompt({
      message: options.message,
      default: options.defaultValue,
      required: true
    });
    return value.trim();
  }
};
