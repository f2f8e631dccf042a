#!/usr/bin/env node
import { parseArgs } from "node:util";
import { ConversionService } from "./conversion-service";
import { formatBatchSummary, formatLabelForTargetFormat, toErrorMessage } from "./lib/format";
import { Logger, createConsoleLogger } from "./lib/logger";
import { resolveSettingsFilePath } from "./lib/settings";
import { SettingsSession } from "./lib/settings-session";
import type { ProgressEvent, SettingsDocument, TargetFormat } from "./types";

const USAGE = `Usage:
  image-converter convert <image> [--format webp|avif] [--out <dir>]
  image-converter batch [<folder>] [--format webp|avif] [--out <dir>]
  image-converter settings [--format webp|avif] [--lossless | --lossy] [--quality <0-100>]
                           [--resize original|<width>x<height>] [--out <dir>]`;

const OPTIONS = {
  format: { type: "string", short: "f" },
  out: { type: "string", short: "o" },
  lossless: { type: "boolean" },
  lossy: { type: "boolean" },
  quality: { type: "string", short: "q" },
  resize: { type: "string", short: "r" },
  help: { type: "boolean", short: "h" },
} as const;

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function parseTargetFormat(value: string): TargetFormat {
  const lower = value.toLowerCase();
  if (lower === "webp" || lower === "avif") return lower;
  throw new UsageError(`Unknown format: ${value} (expected webp or avif)`);
}

function parseQuality(value: string): number {
  const quality = Number(value);
  if (!Number.isInteger(quality) || quality < 0 || quality > 100) {
    throw new UsageError(`Quality must be an integer between 0 and 100, got ${value}`);
  }
  return quality;
}

type ResizeChoice = { resizeMode: "original" } | { resizeMode: "specify"; width: number; height: number };

function parseResize(value: string): ResizeChoice {
  if (value === "original") return { resizeMode: "original" };
  const match = /^(\d+)x(\d+)$/i.exec(value);
  if (!match || Number(match[1]) < 1 || Number(match[2]) < 1) {
    throw new UsageError(`Resize must be "original" or <width>x<height>, got ${value}`);
  }
  return { resizeMode: "specify", width: Number(match[1]), height: Number(match[2]) };
}

function describeSettings(document: SettingsDocument): string {
  const formats: TargetFormat[] = ["webp", "avif"];
  const lines = formats.map((format) => {
    const settings = document[format];
    const mode = settings.lossless ? "lossless" : `quality ${settings.quality}`;
    const size = settings.resizeMode === "specify" ? `${settings.width}x${settings.height}` : "original size";
    return `${formatLabelForTargetFormat(format)}: ${mode}, ${size}`;
  });
  lines.push(`Output folder: ${document.outputFolderPath ?? "(not set)"}`);
  lines.push(`Batch folder: ${document.batchFolderPath ?? "(not set)"}`);
  return lines.join("\n");
}

function createStatusLine(): { update: (event: ProgressEvent) => void; end: () => void } {
  const interactive = Boolean(process.stdout.isTTY);
  let dirty = false;
  return {
    update: (event) => {
      if (interactive) {
        process.stdout.write(`\r\x1b[2K${event.message}`);
        dirty = true;
      } else {
        process.stdout.write(`${event.message}\n`);
      }
    },
    end: () => {
      if (dirty) process.stdout.write("\n");
      dirty = false;
    },
  };
}

async function run(argv: string[], logger: Logger): Promise<number> {
  const { values, positionals } = parseArgs({ args: argv, options: OPTIONS, allowPositionals: true });
  const [command, target] = positionals;

  if (values.help || !command) {
    console.log(USAGE);
    return command || values.help ? 0 : 1;
  }

  const format = parseTargetFormat(values.format ?? "webp");
  const session = await SettingsSession.open(resolveSettingsFilePath(__dirname), { logger });

  try {
    if (values.out) {
      const outputFolderPath = values.out;
      await session.update((draft) => {
        draft.outputFolderPath = outputFolderPath;
      });
    }

    const service = new ConversionService({ logger });
    const statusLine = createStatusLine();

    switch (command) {
      case "convert": {
        const result = await service.convertOne({
          sourcePath: target,
          outputDir: session.document.outputFolderPath,
          format,
          settings: session.settingsFor(format),
          onProgress: statusLine.update,
        });
        statusLine.end();
        if (!result.ok) {
          console.error(`Conversion failed: ${result.error.message}`);
          return 1;
        }
        console.log(`Saved ${result.outputPath}`);
        return 0;
      }

      case "batch": {
        if (target) {
          await session.update((draft) => {
            draft.batchFolderPath = target;
          });
        }
        const controller = new AbortController();
        const abort = () => controller.abort();
        process.once("SIGINT", abort);

        try {
          const outcome = await service.convertBatch({
            folder: session.document.batchFolderPath,
            outputDir: session.document.outputFolderPath,
            format,
            settings: session.settingsFor(format),
            onProgress: statusLine.update,
            signal: controller.signal,
          });
          statusLine.end();

          switch (outcome.kind) {
            case "failed":
              console.error(`Batch failed: ${outcome.error.message}`);
              return 1;
            case "nothing-to-convert":
              console.error(`Nothing to convert in ${outcome.folder}`);
              return 1;
            case "completed":
              console.log(formatBatchSummary(outcome.result));
              for (const failure of outcome.result.perFileErrors) {
                console.log(`  ${failure.path}: ${failure.message}`);
              }
              return outcome.result.failures > 0 || outcome.result.cancelled ? 1 : 0;
          }
        } finally {
          process.removeListener("SIGINT", abort);
        }
      }

      case "settings": {
        const quality = values.quality === undefined ? undefined : parseQuality(values.quality);
        const resize = values.resize === undefined ? undefined : parseResize(values.resize);
        if (values.lossless && values.lossy) throw new UsageError("Pass either --lossless or --lossy, not both");
        const lossless = values.lossless ? true : values.lossy ? false : undefined;

        if (quality !== undefined || resize !== undefined || lossless !== undefined) {
          const saved = await session.update((draft) => {
            const settings = draft[format];
            if (lossless !== undefined) settings.lossless = lossless;
            if (quality !== undefined) settings.quality = quality;
            if (resize) Object.assign(settings, resize);
          });
          if (!saved) return 1;
        }
        console.log(describeSettings(session.document));
        return 0;
      }

      default:
        throw new UsageError(`Unknown command: ${command}`);
    }
  } finally {
    await session.close();
  }
}

const logger = createConsoleLogger();

run(process.argv.slice(2), logger).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    if (error instanceof UsageError) {
      console.error(`${error.message}\n\n${USAGE}`);
    } else {
      logger.error(toErrorMessage(error, "Unexpected error"));
    }
    process.exitCode = 1;
  },
);
