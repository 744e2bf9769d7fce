export interface PromptDefinition {
  label: string;
  /** Shown under the label, e.g. how to write a list on one line. */
  hint?: string;
}

/** Interactive question source. Returns one answer per prompt, in prompt order. */
export interface PromptSource {
  ask(title: string, prompts: readonly PromptDefinition[]): Promise<string[]>;
  note(message: string): void;
}
