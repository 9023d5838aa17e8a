#!/usr/bin/env node
/**
 * myosevka-build CLI
 * 引数なしで設定ディレクトリ内の全設定をビルド・インストールする
 */

import { loadSettings } from "../config/index.js";
import { ZxCommandRunner } from "../exec/index.js";
import { PipelineError, runPipeline } from "../pipeline/index.js";

class CliError extends Error {
  constructor(
    public readonly code: string,
    message: string
  ) {
    super(message);
    this.name = "CliError";
  }
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args[0] === "help" || args[0] === "--help" || args[0] === "-h") {
    outputHelp();
    return;
  }

  try {
    if (args.length > 0) {
      throw new CliError("INVALID_INPUT", `Unexpected arguments: ${args.join(" ")}`);
    }

    const settings = loadSettings();
    const summary = await runPipeline(settings, { runner: new ZxCommandRunner() });
    for (const result of summary.results) {
      process.stderr.write(`${result.planId}: installed ${result.installed.length} font(s)\n`);
    }
  } catch (error) {
    if (error instanceof CliError) {
      outputError(error.code, error.message);
      process.exitCode = 1;
      return;
    }
    if (error instanceof PipelineError) {
      outputError(error.stage, error.message, error.cause);
      process.exitCode = 1;
      return;
    }
    const message = error instanceof Error ? error.message : "Unknown error";
    outputError("internal", message);
    process.exitCode = 1;
  }
}

function outputError(label: string, message: string, cause?: unknown): void {
  process.stderr.write(`error [${label}] ${message}\n`);
  if (cause instanceof Error) {
    process.stderr.write(`  caused by: ${cause.message}\n`);
  }
}

function outputHelp(): void {
  process.stdout.write(
    [
      "Usage: myosevka-build",
      "",
      "Builds every *.ini / *.toml config in the config directory, patches the fonts",
      "when requested and installs them into the user font directory.",
      "",
      "Environment:",
      "  MYOSEVKA_CONFIG_DIR      config directory",
      "  MYOSEVKA_CACHE_DIR       cache directory (toolchain + patch tool)",
      "  MYOSEVKA_FONT_DIR        font install directory",
      "  MYOSEVKA_TOOLCHAIN_REPO  toolchain git URL",
      "  MYOSEVKA_PATCHER_SOURCE  archive | git",
      "  MYOSEVKA_PATCHER_URL     patch tool archive or git URL",
      "  MYOSEVKA_AUDIT_FIX       0 to skip npm audit fix",
      "  MYOSEVKA_SILENT          1 to silence progress logs",
      "",
    ].join("\n")
  );
}

main().catch((error) => {
  const message = error instanceof Error ? error.message : "Unknown error";
  outputError("internal", message);
  process.exit(1);
});
