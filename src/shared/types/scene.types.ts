//shared/types/scene.types.ts

import { z } from "zod";



export const DEFAULT_SCENARIO_DURATIONS: Readonly<Record<string, number>> = {
    hook: 7,
    problem: 7,
    solution: 10,
    cta: 6,
};

export const SceneDescription = z.object({
    scenario: z.string().trim().min(1).describe("Identifier of the scene, unique within a job (e.g. 'hook')"),
    description: z.string().trim().min(1, "description must not be empty").describe("Visual description of the scene"),
    durationSeconds: z.number().positive("durationSeconds must be positive").describe("Target clip length in seconds"),
    cameraWork: z.string().optional(),
    lighting: z.string().optional(),
    audioDesign: z.string().optional(),
    backgroundMusic: z.string().optional(),
    soundEffects: z.string().optional(),
    dialogNarration: z.string().optional(),
    audioPrompt: z.string().optional().describe("Overrides the audio prompt assembled from the audio fields"),
    imagePrompt: z.string().optional().describe("Text for a pre-generated static image of the scene"),
    imagePath: z.string().optional().describe("Local image used as the scene's static image"),
});
export type SceneDescription = z.infer<typeof SceneDescription>;

export const SceneDescriptionList = z.array(SceneDescription);
