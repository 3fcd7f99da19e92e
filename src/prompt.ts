import prompts from 'prompts';

export interface Prompter {
  text(message: string, initial?: string): Promise<string | undefined>;
  password(message: string): Promise<string | undefined>;
  confirm(message: string): Promise<boolean>;
}

// Ctrl+C resolves with an empty answer object, which reads as undefined / false below
export const terminalPrompter: Prompter = {
  async text(message, initial) {
    const { value } = await prompts({ type: 'text', name: 'value', message, initial });
    return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
  },

  async password(message) {
    const { value } = await prompts({ type: 'password', name: 'value', message });
    return typeof value === 'string' && value !== '' ? value : undefined;
  },

  async confirm(message) {
    const { confirmed } = await prompts({ type: 'confirm', name: 'confirmed', message, initial: false });
    return confirmed === true;
  },
};
