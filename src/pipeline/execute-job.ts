#!/usr/bin/env node
import * as dotenv from "dotenv";
dotenv.config();
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { loadConfig } from "../shared/config.js";
import { logger } from "../shared/logger.js";
import { HttpGenerationClient } from "../shared/services/generation-client.js";
import { JobRegistry } from "../shared/services/job-registry.js";
import { MediaController } from "../shared/services/media-controller.js";
import { JobEvent, SceneDescription, SceneDescriptionList } from "../shared/types/index.js";
import { InvalidInputError, extractErrorMessage } from "../shared/utils/errors.js";
import { parseSceneDescriptions } from "../shared/utils/scene-parser.js";
import { formatTime } from "../shared/utils/utils.js";
import { JobOrchestrator } from "./services/job-orchestrator.js";



export async function loadScenes(scenesFile: string | undefined, responseFile: string | undefined): Promise<SceneDescription[]> {
  if (scenesFile) {
    const raw: unknown = JSON.parse(await fs.readFile(scenesFile, "utf8"));
    const parsed = SceneDescriptionList.safeParse(raw);
    if (!parsed.success) {
      throw new InvalidInputError(`Invalid scenes file ${scenesFile}`, { issues: parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`) });
    }
    const baseDir = path.dirname(path.resolve(scenesFile));
    return parsed.data.map(scene => scene.imagePath ? { ...scene, imagePath: path.resolve(baseDir, scene.imagePath) } : scene);
  }

  if (responseFile) {
    const scenes = parseSceneDescriptions(await fs.readFile(responseFile, "utf8"), []);
    if (scenes.length === 0) {
      throw new InvalidInputError(`No scenes could be parsed from ${responseFile}`);
    }
    return scenes;
  }

  throw new InvalidInputError("Either --scenes or --response is required");
}

function logJobEvent(event: JobEvent) {
  switch (event.type) {
    case "JOB_CREATED":
      logger.info({ jobId: event.jobId, scenarios: event.scenarios }, "Job created");
      break;
    case "SCENE_UPDATED":
      logger.info({
        jobId: event.jobId,
        scenario: event.scene.scenario,
        status: event.scene.status,
        progress: event.scene.progress,
      }, `[${event.scene.scenario}] ${event.scene.status} ${event.scene.progress}%`);
      break;
    case "ASSEMBLY_UPDATED":
      logger.info({ jobId: event.jobId, assembly: event.assembly }, `Assembly ${event.assembly.status}`);
      break;
  }
}

async function main() {

  const argv = await yargs(hideBin(process.argv))
    .option("scenes", {
      alias: [ "file", "scenesPath" ],
      type: "string",
      description: "Path to a JSON array of scene descriptions",
    })
    .option("response", {
      type: "string",
      description: "Path to a text response with **SCENE sections to parse",
    })
    .option("owner", {
      type: "string",
      default: "cli",
      description: "Owner reference attributed to the job",
    })
    .option("continuity", {
      type: "boolean",
      description: "Seed each scene with the last frame of the previous one (use --no-continuity to disable)",
    })
    .option("reference-image", {
      alias: "referenceImage",
      type: "string",
      description: "Product image or logo that generated static images are derived from",
    })
    .option("output", {
      alias: "outputDir",
      type: "string",
      description: "Directory for generated assets",
    })
    .help()
    .argv;

  const config = loadConfig({
    ...process.env,
    ...(argv.output ? { OUTPUT_DIR: argv.output } : {}),
    ...(argv.continuity !== undefined ? { FRAME_CONTINUITY: String(argv.continuity) } : {}),
  });

  const scenes = await loadScenes(argv.scenes, argv.response);

  const { generation, media } = config;
  const orchestrator = new JobOrchestrator({
    config,
    registry: new JobRegistry(logJobEvent),
    client: new HttpGenerationClient({
      ...generation,
      videoWidth: media.videoWidth,
      videoHeight: media.videoHeight,
      imageWidth: media.imageWidth,
      imageHeight: media.imageHeight,
    }),
    transcoder: new MediaController({
      width: media.videoWidth,
      height: media.videoHeight,
      lastFrameOffsetSeconds: media.lastFrameOffsetSeconds,
    }),
  });

  process.on("SIGINT", () => {
    logger.warn("Shutting down... waiting for the current job to settle");
    orchestrator.shutdown()
      .then(() => process.exit(130))
      .catch((error: unknown) => {
        logger.error({ error: extractErrorMessage(error) }, "Error during shutdown");
        process.exit(1);
      });
    setTimeout(() => process.exit(1), 5000).unref();
  });

  const startedAt = Date.now();
  const jobId = orchestrator.submit(scenes, argv.owner, {
    referenceImagePath: argv.referenceImage ? path.resolve(argv.referenceImage) : undefined,
  });
  logger.info({ jobId, scenes: scenes.length, videoModel: generation.videoModel, audioModel: generation.audioModel }, "Submitted generation job");

  const status = await orchestrator.waitForJob(jobId);
  logger.info({ overallStatus: status.overallStatus, elapsed: formatTime((Date.now() - startedAt) / 1000) }, "Job finished");
  process.stdout.write(JSON.stringify(status, null, 2) + "\n");

  process.exitCode = status.overallStatus === "failed" || status.assembly.status === "failed" ? 1 : 0;
}

if (process.argv[ 1 ] && path.resolve(process.argv[ 1 ]) === fileURLToPath(import.meta.url)) {
  main().catch((error: unknown) => {
    logger.fatal({ error: extractErrorMessage(error) }, "Generation job failed");
    process.exit(1);
  });
}
