#!/usr/bin/env node
import "dotenv/config";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { loadEnv } from "./config/env.js";
import { createBoundaryResolver } from "./config/detector.js";
import { dryRun, readTranscriptFile, runHomilyWorkflow } from "./services/business/homilyWorkflow.js";
import { writeSrtFile } from "./services/business/captionService.js";
import { getGenericErrorMessage } from "./utils/errorMessages.js";
import { BadRequestError } from "./utils/errors.js";
import {
  PromptCancelled,
  cleanPath,
  createInquirerPrompter,
  isInteractive,
  type Prompter,
} from "./utils/prompter.js";

async function resolvePath(
  value: string | undefined,
  label: string,
  prompter: Prompter | undefined
): Promise<string> {
  if (value && value.trim() !== "") {
    return cleanPath(value);
  }
  if (!prompter) {
    throw new BadRequestError(`${label} is required`);
  }
  return cleanPath(await prompter.input(`Enter ${label} (e.g., /path/to/file):`));
}

async function main(rawArgs = hideBin(process.argv)) {
  const prompter = isInteractive() ? createInquirerPrompter() : undefined;

  await yargs(rawArgs)
    .scriptName("homily")
    .command(
      "process [audio] [image]",
      "Run the full pipeline for a Mass recording",
      (command) =>
        command
          .positional("audio", { type: "string", describe: "Recording of the Mass" })
          .positional("image", { type: "string", describe: "Background image for the video" })
          .option("skip-publish", {
            type: "boolean",
            default: false,
            describe: "Stop after the MDX post; no YouTube or content repo",
          }),
      async (argv) => {
        const env = loadEnv();
        const resolver = createBoundaryResolver(env);
        const audioPath = await resolvePath(argv.audio, "AUDIO FILE PATH", prompter);
        const imagePath = await resolvePath(argv.image, "IMAGE FILE PATH", prompter);
        await runHomilyWorkflow(
          { audioPath, imagePath },
          {
            env,
            resolver,
            prompter: prompter ?? createInquirerPrompter(),
            skipPublish: argv["skip-publish"],
          }
        );
      }
    )
    .command(
      "find-homily <transcript>",
      "Print the homily boundary found in a transcript",
      (command) => command.positional("transcript", { type: "string", demandOption: true }),
      async (argv) => {
        const resolver = createBoundaryResolver(loadEnv());
        const result = resolver.resolve(await readTranscriptFile(cleanPath(argv.transcript)));
        if (result.status === "not-found") {
          console.log(`✗ ${result.message} (${result.reason})`);
          process.exitCode = 1;
          return;
        }
        console.log(JSON.stringify({ first: result.first, last: result.last, markerStart: result.markerStart, markerEnd: result.markerEnd }, null, 2));
      }
    )
    .command(
      "captions <transcript> <out>",
      "Write SRT captions for the homily in a transcript",
      (command) =>
        command
          .positional("transcript", { type: "string", demandOption: true })
          .positional("out", { type: "string", demandOption: true })
          .option("shift", { type: "number", describe: "Seconds added to every caption (defaults to SRT_SHIFT_SEC)" }),
      async (argv) => {
        const env = loadEnv();
        const result = createBoundaryResolver(env).findHomily(await readTranscriptFile(cleanPath(argv.transcript)));
        if (result.status === "not-found") {
          console.log(`✗ ${result.message} (${result.reason})`);
          process.exitCode = 1;
          return;
        }
        await writeSrtFile(result.videoSegments, cleanPath(argv.out), argv.shift ?? env.SRT_SHIFT_SEC);
      }
    )
    .command(
      "dry-run <transcript>",
      "Detect the homily and print a summary without writing files",
      (command) =>
        command
          .positional("transcript", { type: "string", demandOption: true })
          .option("mdx", { type: "boolean", default: false, describe: "Also generate the MDX page in memory" }),
      async (argv) => {
        const env = loadEnv();
        const selection = await dryRun(cleanPath(argv.transcript), createBoundaryResolver(env), {
          srtShiftSec: env.SRT_SHIFT_SEC,
          withMdx: argv.mdx,
          donationUrl: env.DONATION_URL,
        });
        if (!selection) process.exitCode = 1;
      }
    )
    .demandCommand(1)
    .strict()
    .help()
    .parseAsync();
}

main().catch((error: unknown) => {
  if (error instanceof PromptCancelled) {
    console.log("[cli] Cancelled.");
    process.exitCode = 130;
    return;
  }
  console.error(`[cli] ✗ ${getGenericErrorMessage(error)}`);
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
