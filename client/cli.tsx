#!/usr/bin/env node

/**
 * gridsketch - terminal diagram editor, entry point
 */

import React from "react";
import { render } from "ink";
import { Command } from "commander";
import chalk from "chalk";
import * as readline from "readline";
import EditorApp from "./components/EditorApp";
import type { EditorConfig } from "./config/editorConfig";
import { EditorConfigError, resolveEditorConfig } from "./config/editorConfig";
import type { EditorState } from "./core/orchestration/state/EditorState";
import { createEditorState, editorStateFromDiagram } from "./core/orchestration/state/EditorState";
import type { LoadResult } from "./services/diagramStore";
import { loadDiagram } from "./services/diagramStore";
import { setDebugLogging } from "./utils/debugLog";
import { DISABLE_MOUSE, ENABLE_MOUSE, ENTER_ALT_SCREEN, LEAVE_ALT_SCREEN } from "./hooks/terminalInput";

export const DEFAULT_TITLE = "Untitled Diagram";

interface GlobalOptions {
  dir?: string;
  exportWidth?: string;
  debug?: boolean;
}

const program = new Command();

program
  .name("gridsketch")
  .description("Draw boxes, diamonds, text and connectors as ASCII art in the terminal")
  .version("1.0.0")
  .option("-d, --dir <path>", "Directory for <title>.json and <title>.txt")
  .option("-w, --export-width <columns>", "Width of the plain-text export")
  .option("--debug", "Log orchestration details");

function loadConfig(): EditorConfig {
  const options = program.opts<GlobalOptions>();
  const config = resolveEditorConfig(process.env, {
    directory: options.dir,
    exportWidth: options.exportWidth,
    debug: options.debug,
  });
  setDebugLogging(config.debug);
  return config;
}

async function promptTitle(): Promise<string> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await new Promise<string>(resolve => {
      rl.question("Enter a title for your diagram:\n", resolve);
    });
    return answer.trim() || DEFAULT_TITLE;
  } finally {
    rl.close();
  }
}

function stateFromLoad(result: LoadResult, reportMissing: boolean): EditorState {
  const report = result.status === "invalid" || (result.status === "missing" && reportMissing);
  if (report && result.warning) {
    console.error(chalk.yellow(`Error: ${result.warning}`));
  }
  const state = result.status === "loaded" ? editorStateFromDiagram(result.diagram) : createEditorState(result.diagram.title);
  if (report && result.warning) {
    state.statusMessage = result.warning;
  }
  return state;
}

async function runEditor(state: EditorState, config: EditorConfig): Promise<void> {
  process.stdout.write(ENTER_ALT_SCREEN + ENABLE_MOUSE);
  try {
    const app = render(
      <EditorApp initialState={state} directory={config.directory} exportWidth={config.exportWidth} />,
      { exitOnCtrlC: true }
    );
    await app.waitUntilExit();
  } finally {
    process.stdout.write(DISABLE_MOUSE + LEAVE_ALT_SCREEN);
  }
}

program
  .command("new")
  .description("Start a new diagram")
  .argument("[title...]", "Diagram title")
  .action(async (words: string[]) => {
    const config = loadConfig();
    const title = words.join(" ") || DEFAULT_TITLE;
    await runEditor(createEditorState(title), config);
  });

program
  .command("open")
  .description("Open <title>.json, or start it new when it cannot be read")
  .argument("<title...>", "Diagram title")
  .action(async (words: string[]) => {
    const config = loadConfig();
    const result = await loadDiagram(words.join(" "), config.directory);
    await runEditor(stateFromLoad(result, true), config);
  });

program
  .argument("[title...]", "Diagram title; opens <title>.json when it exists")
  .action(async (words: string[]) => {
    const config = loadConfig();
    if (words.length === 0) {
      await runEditor(createEditorState(await promptTitle()), config);
      return;
    }
    const result = await loadDiagram(words.join(" "), config.directory);
    await runEditor(stateFromLoad(result, false), config);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  if (error instanceof EditorConfigError) {
    console.error(chalk.red(error.message));
  } else {
    console.error(chalk.red("Error:"), error);
  }
  process.exit(1);
});
