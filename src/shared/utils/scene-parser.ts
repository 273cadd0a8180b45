import { DEFAULT_SCENARIO_DURATIONS, SceneDescription } from "../types/index.js";



const SCENARIO_KEYWORDS: ReadonlyArray<[ string, string[] ]> = [
    [ "hook", [ "HOOK" ] ],
    [ "problem", [ "PROBLEM" ] ],
    [ "solution", [ "SOLUTION" ] ],
    [ "cta", [ "CTA", "CALL" ] ],
];

type BlockField = "visual" | "camera" | "lighting" | "audio";

const BLOCK_MARKERS: ReadonlyArray<[ string, BlockField ]> = [
    [ "**Visual Description:**", "visual" ],
    [ "**Camera/Movement:**", "camera" ],
    [ "**Camera:**", "camera" ],
    [ "**Lighting & Mood:**", "lighting" ],
    [ "**Lighting:**", "lighting" ],
    [ "**Audio Design:**", "audio" ],
];

type AudioField = "backgroundMusic" | "soundEffects" | "dialogNarration" | "audioDesign";

const AUDIO_MARKERS: ReadonlyArray<[ string, AudioField ]> = [
    [ "- Background Music:", "backgroundMusic" ],
    [ "- Sound Effects:", "soundEffects" ],
    [ "- Dialog/Narration:", "dialogNarration" ],
    [ "- Audio Balance:", "audioDesign" ],
];

export interface ParseOptions {
    /** Static image paths keyed by scenario, attached to the parsed scenes. */
    imagePaths?: Record<string, string>;
    durations?: Record<string, number>;
}

function detectScenario(heading: string): string | undefined {
    const upper = heading.toUpperCase();
    return SCENARIO_KEYWORDS.find(([ , keywords ]) => keywords.some(k => upper.includes(k)))?.[ 0 ];
}

function parseSection(section: string, options: ParseOptions): SceneDescription | undefined {
    const [ heading = "", ...lines ] = section.trim().split("\n");
    const scenario = detectScenario(heading);
    if (!scenario) return undefined;

    const blocks: Record<BlockField, string[]> = { visual: [], camera: [], lighting: [], audio: [] };
    const audio: Partial<Record<AudioField, string>> = {};
    let current: BlockField | undefined;

    for (const raw of lines) {
        const line = raw.trim();
        if (!line) continue;

        const block = BLOCK_MARKERS.find(([ marker ]) => line.startsWith(marker));
        if (block) {
            const [ marker, field ] = block;
            current = field;
            const rest = line.slice(marker.length).trim();
            if (rest && field !== "audio") blocks[ field ].push(rest);
            continue;
        }

        const audioMarker = AUDIO_MARKERS.find(([ marker ]) => line.startsWith(marker));
        if (audioMarker) {
            const [ marker, field ] = audioMarker;
            audio[ field ] = line.slice(marker.length).trim();
            continue;
        }

        if (current && current !== "audio" && !line.startsWith("**")) {
            blocks[ current ].push(line);
        }
    }

    const description = blocks.visual.join(" ").trim();
    if (!description) return undefined;

    const { backgroundMusic, soundEffects, dialogNarration } = audio;
    let audioDesign = audio.audioDesign;
    if (!audioDesign && (backgroundMusic || soundEffects || dialogNarration)) {
        audioDesign = [
            backgroundMusic && `Music: ${backgroundMusic}`,
            soundEffects && `SFX: ${soundEffects}`,
            dialogNarration && `Dialog: ${dialogNarration}`,
        ].filter(Boolean).join("; ");
    }

    const durations = { ...DEFAULT_SCENARIO_DURATIONS, ...options.durations };
    const imagePath = Object.entries(options.imagePaths ?? {})
        .find(([ key ]) => key.toLowerCase() === scenario)?.[ 1 ];

    return {
        scenario,
        description,
        durationSeconds: durations[ scenario ] ?? 7,
        cameraWork: blocks.camera.join(" ").trim() || "Standard camera work",
        lighting: blocks.lighting.join(" ").trim() || "Professional lighting",
        audioDesign: audioDesign || "Background music with narration",
        backgroundMusic: backgroundMusic || "Upbeat background music",
        soundEffects: soundEffects || "Subtle sound effects",
        dialogNarration: dialogNarration || "Engaging narration",
        ...(imagePath ? { imagePath } : {}),
    };
}

/**
 * Turns a free-form "**SCENE n: HOOK (7 seconds)**" response into scene descriptions.
 * Sections without a recognised scenario or a visual description are skipped. When
 * nothing usable is found the fallback is returned.
 */
export function parseSceneDescriptions(text: string, fallback: SceneDescription[], options: ParseOptions = {}): SceneDescription[] {
    const scenes: SceneDescription[] = [];
    const seen = new Set<string>();

    for (const section of text.split("**SCENE").slice(1)) {
        const scene = parseSection(section, options);
        if (scene && !seen.has(scene.scenario)) {
            seen.add(scene.scenario);
            scenes.push(scene);
        }
    }

    return scenes.length > 0 ? scenes : fallback;
}
