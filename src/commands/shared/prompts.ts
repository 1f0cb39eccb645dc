import { Writable } from "node:stream";
import readline from "node:readline/promises";

export interface Prompter {
  ask(question: string): Promise<string>;
  /** Like `ask`, but the typed answer is not echoed. */
  askSecret(question: string): Promise<string>;
  close(): void;
}

interface ConsolePrompterOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

export function createConsolePrompter(options: ConsolePrompterOptions = {}): Prompter {
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stdout;
  let muted = false;

  const maskedOutput = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      if (!muted) {
        output.write(chunk);
      }
      callback();
    }
  });

  const rl = readline.createInterface({
    input,
    output: maskedOutput,
    terminal: true
  });

  return {
    ask: async (question) => (await rl.question(question)).trim(),
    askSecret: async (question) => {
      output.write(question);
      muted = true;
      try {
        return await rl.question("");
      } finally {
        muted = false;
        output.write("\n");
      }
    },
    close: () => {
      rl.close();
    }
  };
}

export interface ScriptedPrompter extends Prompter {
  questions: string[];
}

/** Replays `answers` in order; running out of answers is an error. */
export function createScriptedPrompter(answers: string[]): ScriptedPrompter {
  const queue = [...answers];
  const questions: string[] = [];

  const next = async (question: string): Promise<string> => {
    questions.push(question);
    const answer = queue.shift();
    if (answer === undefined) {
      throw new Error(`E_PROMPT_EXHAUSTED: no scripted answer for '${question.trim()}'`);
    }

    return answer;
  };

  return {
    questions,
    ask: async (question) => (await next(question)).trim(),
    askSecret: next,
    close: () => undefined
  };
}

export interface PromptChoice<T> {
  key: string;
  label: string;
  value: T;
}

/** Re-asks until one of the choice keys is entered; an empty answer picks `defaultKey` when given. */
export async function askChoice<T>(
  prompter: Prompter,
  question: string,
  choices: Array<PromptChoice<T>>,
  defaultKey?: string
): Promise<T> {
  const menu = choices.map((choice) => `  ${choice.key}. ${choice.label}`).join("\n");
  const suffix = defaultKey ? ` [${defaultKey}]` : "";

  for (;;) {
    const answer = await prompter.ask(`${question}\n${menu}\nEnter choice${suffix}: `);
    const key = answer.length === 0 && defaultKey ? defaultKey : answer;
    const choice = choices.find((item) => item.key === key);
    if (choice) {
      return choice.value;
    }
  }
}

export async function askYesNo(prompter: Prompter, question: string, defaultValue: boolean): Promise<boolean> {
  const hint = defaultValue ? "Y/n" : "y/N";

  for (;;) {
    const answer = (await prompter.ask(`${question} (${hint}): `)).toLowerCase();
    if (answer.length === 0) {
      return defaultValue;
    }

    if (answer === "y" || answer === "yes") {
      return true;
    }

    if (answer === "n" || answer === "no") {
      return false;
    }
  }
}

export async function askPositiveInt(prompter: Prompter, question: string): Promise<number> {
  for (;;) {
    const answer = await prompter.ask(question);
    if (/^\d+$/.test(answer) && Number(answer) > 0) {
      return Number(answer);
    }
  }
}

export async function askRequired(prompter: Prompter, question: string, secret = false): Promise<string> {
  for (;;) {
    const answer = secret ? await prompter.askSecret(question) : await prompter.ask(question);
    if (answer.length > 0) {
      return answer;
    }
  }
}
