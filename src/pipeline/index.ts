export { JobOrchestrator } from "./services/job-orchestrator.js";
export type { JobOrchestratorDeps, SubmitOptions } from "./services/job-orchestrator.js";
export { ParallelFanOutGenerator } from "./agents/fan-out-generator.js";
export type { FanOutOutcome, FanOutTask } from "./agents/fan-out-generator.js";
export { FrameChainedVideoGenerator } from "./agents/frame-chain-generator.js";
export { AssemblyEngine } from "./agents/assembly-engine.js";
export { buildAudioPrompt, buildImagePrompt, buildVideoPrompt } from "./agents/prompt-builder.js";
export { loadConfig } from "../shared/config.js";
export type { AppConfig } from "../shared/config.js";
export { HttpGenerationClient } from "../shared/services/generation-client.js";
export { MediaController } from "../shared/services/media-controller.js";
export { JobRegistry } from "../shared/services/job-registry.js";
export { parseSceneDescriptions } from "../shared/utils/scene-parser.js";
export * from "../shared/utils/errors.js";
export * from "../shared/types/index.js";
