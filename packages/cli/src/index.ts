import { readFile } from "node:fs/promises";
import { basename, resolve } from "node:path";
import { confirm } from "@inquirer/prompts";
import {
  ACCEPTED_EXTENSIONS,
  ChatSession,
  inferMediaType,
  loadThreadlineConfig,
  resolveConfig,
  type ResolvedConfig,
  type UploadFile,
} from "@threadline/harness";
import { toFailure } from "@threadline/sdk";
import { Command } from "commander";
import dotenv from "dotenv";
import YAML from "yaml";
import { formatDuration, gray, red, yellow } from "./ansi.js";
import { runInteractive } from "./run-interactive.js";
import { TerminalSink } from "./terminal-sink.js";

export const IMAGE_DIR = ".threadline/images";

export interface CliContext {
  workingDir: string;
  config: ResolvedConfig;
  session: ChatSession;
  sink: TerminalSink;
}

export type SessionFactory = (config: ResolvedConfig) => ChatSession;

const defaultSessionFactory: SessionFactory = (config) => ChatSession.fromConfig(config);

/** Reads files from disk, typing them by extension; unknown types are left for intake to reject. */
export const readUploads = async (workingDir: string, paths: string[]): Promise<UploadFile[]> =>
  await Promise.all(
    paths.map(async (path) => {
      const absolute = resolve(workingDir, path);
      return {
        name: basename(absolute),
        mediaType: inferMediaType(absolute) ?? "application/octet-stream",
        data: await readFile(absolute),
      };
    }),
  );

export const openContext = async (
  workingDir: string,
  createSession: SessionFactory = defaultSessionFactory,
): Promise<CliContext> => {
  dotenv.config({ path: resolve(workingDir, ".env") });
  const config = resolveConfig(await loadThreadlineConfig(workingDir), { workingDir });
  return {
    workingDir,
    config,
    session: createSession(config),
    sink: new TerminalSink({ imageDir: resolve(workingDir, IMAGE_DIR) }),
  };
};

const write = (line: string): void => void process.stdout.write(`${line}\n`);

export const askOnce = async (context: CliContext, text: string, files: string[]): Promise<void> => {
  const outcome = await context.session.submit(
    { text, files: await readUploads(context.workingDir, files) },
    context.sink,
  );
  context.sink.endLine();
  write(gray(`meta> ${formatDuration(outcome.duration)}`));
};

export const showHistory = async (context: CliContext, raw: boolean): Promise<void> => {
  if (raw) {
    process.stdout.write(YAML.stringify(await context.session.items()));
    return;
  }
  const painted = await context.session.paintHistory(context.sink);
  if (painted === 0) {
    write(gray("No history yet."));
  }
};

export const uploadFiles = async (context: CliContext, paths: string[]): Promise<void> => {
  await context.session.submit({ files: await readUploads(context.workingDir, paths) }, context.sink);
  context.sink.endLine();
};

export const resetHistory = async (context: CliContext, skipPrompt: boolean): Promise<void> => {
  if (!skipPrompt) {
    const proceed = await confirm({
      message: `Clear the "${context.session.channel}" history?`,
      default: false,
    });
    if (!proceed) {
      write(gray("Nothing changed."));
      return;
    }
  }
  await context.session.reset();
  write(yellow("History cleared."));
};

const collectRepeatable = (value: string, all: string[]): string[] => [...all, value];

export const buildCli = (createSession: SessionFactory = defaultSessionFactory): Command => {
  const program = new Command();
  const context = (): Promise<CliContext> => openContext(process.cwd(), createSession);

  program
    .name("threadline")
    .description("Chat with a tool-using assistant that remembers the conversation")
    .version("0.1.0");

  program
    .command("chat", { isDefault: true })
    .description("Start an interactive chat session")
    .action(async () => {
      const ctx = await context();
      await runInteractive({
        session: ctx.session,
        sink: ctx.sink,
        model: ctx.config.model,
        readUploads: (paths) => readUploads(ctx.workingDir, paths),
      });
    });

  program
    .command("ask")
    .argument("<text...>", "message to send")
    .description("Send one message and print the streamed answer")
    .option("--file <path>", "upload a file first (repeatable)", collectRepeatable, [])
    .action(async (text: string[], options: { file: string[] }) => {
      await askOnce(await context(), text.join(" "), options.file);
    });

  program
    .command("history")
    .description("Print the stored conversation")
    .option("--raw", "dump stored items as YAML", false)
    .action(async (options: { raw: boolean }) => {
      await showHistory(await context(), options.raw);
    });

  program
    .command("upload")
    .argument("<paths...>", `files to upload (${ACCEPTED_EXTENSIONS.join(", ")})`)
    .description("Upload documents for file search, or images into the conversation")
    .action(async (paths: string[]) => {
      await uploadFiles(await context(), paths);
    });

  program
    .command("reset")
    .description("Clear the conversation history")
    .option("--yes", "skip the confirmation prompt", false)
    .action(async (options: { yes: boolean }) => {
      await resetHistory(await context(), options.yes);
    });

  return program;
};

export const main = async (argv: string[] = process.argv): Promise<void> => {
  try {
    await buildCli().parseAsync(argv);
  } catch (error) {
    const failure = toFailure(error);
    process.stderr.write(`${red(`error> [${failure.code}] ${failure.message}`)}\n`);
    process.exitCode = 1;
  }
};

export { TerminalSink } from "./terminal-sink.js";
export { runInteractive } from "./run-interactive.js";
