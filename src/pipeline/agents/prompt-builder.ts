import { SceneDescription } from "../../shared/types/index.js";



export const DEFAULT_AUDIO_PROMPT = "Professional background music and sound effects that synchronize with the video";

export interface PromptBuilder {
    buildVideoPrompt(scene: SceneDescription): string;
    buildAudioPrompt(scene: SceneDescription): string;
    buildImagePrompt(scene: SceneDescription): string;
}

export function buildVideoPrompt(scene: SceneDescription): string {
    const parts = [ `Visual: ${scene.description}` ];
    if (scene.cameraWork) parts.push(`Camera: ${scene.cameraWork}`);
    if (scene.lighting) parts.push(`Lighting: ${scene.lighting}`);
    return parts.join(". ");
}

export function buildAudioPrompt(scene: SceneDescription): string {
    if (scene.audioPrompt?.trim()) return scene.audioPrompt.trim();

    const parts: string[] = [];
    if (scene.backgroundMusic) parts.push(`Background music: ${scene.backgroundMusic}`);
    if (scene.soundEffects) parts.push(`Sound effects: ${scene.soundEffects}`);
    if (scene.dialogNarration) parts.push(`Dialog/narration: ${scene.dialogNarration}`);
    if (parts.length === 0 && scene.audioDesign) parts.push(scene.audioDesign);
    return parts.length > 0 ? parts.join(". ") : DEFAULT_AUDIO_PROMPT;
}

export function buildImagePrompt(scene: SceneDescription): string {
    return scene.imagePrompt?.trim() || scene.description;
}

export const defaultPromptBuilder: PromptBuilder = {
    buildVideoPrompt,
    buildAudioPrompt,
    buildImagePrompt,
};
