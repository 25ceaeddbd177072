/**
 * In-memory output streams and terminals
 */

export interface MemorySink {
  write(chunk: string): boolean;
  isTTY: boolean;
  /** Everything written so far */
  text(): string;
}

export function memorySink(isTTY = false): MemorySink {
  const chunks: string[] = [];
  return {
    isTTY,
    write(chunk: string): boolean {
      chunks.push(chunk);
      return true;
    },
    text: () => chunks.join(""),
  };
}

export interface ScriptedTerminal {
  isInteractive(): boolean;
  confirm(question: string): Promise<boolean>;
  /** Questions asked, in order */
  readonly questions: string[];
}

/**
 * Terminal that answers prompts from a fixed list of replies.
 * Pass `interactive: false` to model piped stdin.
 */
export function scriptedTerminal(options: { interactive: boolean; answers?: boolean[] }): ScriptedTerminal {
  const answers = [...(options.answers ?? [])];
  const questions: string[] = [];
  return {
    questions,
    isInteractive: () => options.interactive,
    confirm: async (question) => {
      questions.push(question);
      return answers.shift() ?? false;
    },
  };
}
