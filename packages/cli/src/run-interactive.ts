/**
 * Interactive chat using plain readline + stdout, like the one-shot commands
 * but looping until the user leaves.
 */
import * as readline from "node:readline";
import { toFailure } from "@threadline/sdk";
import { ACCEPTED_EXTENSIONS, type ChatSession, type UploadFile } from "@threadline/harness";
import YAML from "yaml";
import { cyan, formatDuration, gray, red, yellow } from "./ansi.js";
import type { TerminalSink } from "./terminal-sink.js";

export interface InteractiveOptions {
  session: ChatSession;
  sink: TerminalSink;
  model: string;
  readUploads: (paths: string[]) => Promise<UploadFile[]>;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

const ask = (rl: readline.Interface, prompt: string): Promise<string | undefined> =>
  new Promise((res) => {
    const onClose = (): void => res(undefined);
    rl.once("close", onClose);
    rl.question(prompt, (answer) => {
      rl.off("close", onClose);
      res(answer);
    });
  });

const splitArgs = (rest: string): string[] => rest.split(/\s+/).filter((part) => part.length > 0);

export const runInteractive = async (options: InteractiveOptions): Promise<void> => {
  const { session, sink } = options;
  const output = options.output ?? process.stdout;
  const print = (line: string): void => void output.write(`${line}\n`);

  const rl = readline.createInterface({
    input: options.input ?? process.stdin,
    output,
    terminal: false,
  });

  print(gray(`\nthreadline | ${options.model} | ${session.channel}`));
  print(gray('Type "exit" to quit, "/help" for commands\n'));

  const painted = await session.paintHistory(sink);
  if (painted > 0) {
    print(gray(`--- ${painted} earlier messages ---\n`));
  }

  const prompt = cyan("you> ");
  for (;;) {
    const line = await ask(rl, prompt);
    if (line === undefined) {
      break;
    }
    const trimmed = line.trim();
    if (!trimmed) continue;
    if (trimmed.toLowerCase() === "exit" || trimmed.toLowerCase() === "/exit") break;

    try {
      if (trimmed === "/help") {
        print(gray("commands> /upload <path...> /history /reset /exit"));
        continue;
      }
      if (trimmed === "/reset") {
        await session.reset();
        print(yellow("history cleared"));
        continue;
      }
      if (trimmed === "/history") {
        print(YAML.stringify(await session.items()).trimEnd());
        continue;
      }
      if (trimmed.startsWith("/upload")) {
        const paths = splitArgs(trimmed.slice("/upload".length));
        if (paths.length === 0) {
          print(yellow(`usage: /upload <path...> (${ACCEPTED_EXTENSIONS.join(", ")})`));
          continue;
        }
        await session.submit({ files: await options.readUploads(paths) }, sink);
        sink.endLine();
        continue;
      }
      if (trimmed.startsWith("/")) {
        print(yellow(`Unknown command: ${trimmed}`));
        continue;
      }

      const outcome = await session.submit({ text: trimmed }, sink);
      sink.endLine();
      print(gray(`meta> ${formatDuration(outcome.duration)}\n`));
    } catch (error) {
      sink.endLine();
      const failure = toFailure(error);
      print(red(`error> ${failure.message}`));
    }
  }

  rl.close();
};
