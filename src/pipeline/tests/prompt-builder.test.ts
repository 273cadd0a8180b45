import { describe, it, expect } from 'vitest';
import { DEFAULT_AUDIO_PROMPT, buildAudioPrompt, buildImagePrompt, buildVideoPrompt } from '../agents/prompt-builder.js';
import { scene } from './fakes.js';

describe('prompt builders', () => {
    it('should compose the video prompt from visual, camera and lighting', () => {
        const prompt = buildVideoPrompt(scene('hook', 5, { cameraWork: 'Slow dolly in', lighting: 'Golden hour' }));
        expect(prompt).toBe('Visual: hook shot of the product. Camera: Slow dolly in. Lighting: Golden hour');
    });

    it('should leave out missing video parts', () => {
        expect(buildVideoPrompt(scene('cta', 5))).toBe('Visual: cta shot of the product');
    });

    it('should prefer an explicit audio prompt', () => {
        expect(buildAudioPrompt(scene('hook', 5, { audioPrompt: '  Driving synth beat ', backgroundMusic: 'Piano' }))).toBe('Driving synth beat');
    });

    it('should build the audio prompt from its parts', () => {
        const prompt = buildAudioPrompt(scene('hook', 5, { backgroundMusic: 'Soft piano', dialogNarration: 'Ready to run?' }));
        expect(prompt).toBe('Background music: Soft piano. Dialog/narration: Ready to run?');
    });

    it('should fall back to the audio design, then the default', () => {
        expect(buildAudioPrompt(scene('hook', 5, { audioDesign: 'Ambient city hum' }))).toBe('Ambient city hum');
        expect(buildAudioPrompt(scene('hook', 5))).toBe(DEFAULT_AUDIO_PROMPT);
    });

    it('should use the image prompt when present', () => {
        expect(buildImagePrompt(scene('hook', 5, { imagePrompt: 'Product on a white table' }))).toBe('Product on a white table');
        expect(buildImagePrompt(scene('hook', 5))).toBe('hook shot of the product');
    });
});
