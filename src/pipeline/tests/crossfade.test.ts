import { describe, it, expect } from 'vitest';
import { buildCrossfadePlan, computeCrossfadeOffsets, expectedCrossfadeDuration } from '../../shared/utils/crossfade.js';
import { AssemblyError } from '../../shared/utils/errors.js';

describe('computeCrossfadeOffsets', () => {
    it('should place each transition before the end of the shortened timeline', () => {
        expect(computeCrossfadeOffsets([ 5, 5, 10, 5 ], 0.3)).toEqual([ 4.7, 9.4, 19.1 ]);
    });

    it('should return no offsets for a single clip', () => {
        expect(computeCrossfadeOffsets([ 8 ], 0.3)).toEqual([]);
    });

    it('should keep offsets strictly increasing for clips longer than the transition', () => {
        const offsets = computeCrossfadeOffsets([ 0.5, 0.4, 2, 0.31 ], 0.3);
        for (let i = 1; i < offsets.length; i++) {
            expect(offsets[ i ]).toBeGreaterThan(offsets[ i - 1 ]);
        }
    });
});

describe('expectedCrossfadeDuration', () => {
    it('should subtract one transition per join', () => {
        expect(expectedCrossfadeDuration([ 5, 5, 10, 5 ], 0.3)).toBe(24.1);
        expect(expectedCrossfadeDuration([ 6 ], 0.3)).toBe(6);
        expect(expectedCrossfadeDuration([], 0.3)).toBe(0);
    });
});

const FFMPEG_4_1_FILTERS = new Set([
    'acrossfade', 'aformat', 'anullsrc', 'apad', 'asetpts', 'atrim',
    'color', 'fade', 'format', 'fps', 'overlay', 'pad', 'scale', 'setpts', 'setsar',
]);

function filterNames(graph: readonly string[]): string[] {
    return graph.flatMap(chain => chain
        .replace(/\[[^\]]*\]/g, '')
        .split(',')
        .map(filter => filter.split('=')[ 0 ]));
}

describe('buildCrossfadePlan', () => {
    const options = { width: 1280, height: 720 };

    it('should fade each clip in on an overlay at the computed offsets', () => {
        const plan = buildCrossfadePlan([
            { path: 'a.mp4', durationSeconds: 5, hasAudio: true },
            { path: 'b.mp4', durationSeconds: 5, hasAudio: true },
            { path: 'c.mp4', durationSeconds: 10, hasAudio: true },
        ], 0.3, options);

        expect(plan.offsets).toEqual([ 4.7, 9.4 ]);
        expect(plan.videoLabel).toBe('vx2');
        expect(plan.audioLabel).toBe('ax2');
        expect(plan.expectedDurationSeconds).toBe(19.4);
        expect(plan.filterGraph[ 0 ]).toBe('color=c=black:s=1280x720:r=30:d=19.400,format=yuv420p[base]');
        expect(plan.filterGraph[ 1 ]).toBe('[0:v]scale=1280:720:force_original_aspect_ratio=decrease,pad=1280:720:(ow-iw)/2:(oh-ih)/2,setsar=1,fps=30,format=yuv420p,setpts=PTS-STARTPTS[v0]');
        expect(plan.filterGraph).toContain('[1:v]scale=1280:720:force_original_aspect_ratio=decrease,pad=1280:720:(ow-iw)/2:(oh-ih)/2,setsar=1,fps=30,format=yuva420p,fade=t=in:st=0:d=0.300:alpha=1,setpts=PTS-STARTPTS+4.700/TB[v1]');
        expect(plan.filterGraph).toContain('[2:v]scale=1280:720:force_original_aspect_ratio=decrease,pad=1280:720:(ow-iw)/2:(oh-ih)/2,setsar=1,fps=30,format=yuva420p,fade=t=in:st=0:d=0.300:alpha=1,setpts=PTS-STARTPTS+9.400/TB[v2]');
        expect(plan.filterGraph.slice(-5)).toEqual([
            '[base][v0]overlay=eof_action=pass[vx0]',
            '[vx0][v1]overlay=eof_action=pass[vx1]',
            '[vx1][v2]overlay=eof_action=pass[vx2]',
            '[a0][a1]acrossfade=d=0.300[ax1]',
            '[ax1][a2]acrossfade=d=0.300[ax2]',
        ]);
    });

    it('should use only filters available in the bundled ffmpeg 4.1', () => {
        const plan = buildCrossfadePlan([
            { path: 'a.mp4', durationSeconds: 5, hasAudio: true },
            { path: 'b.mp4', durationSeconds: 5, hasAudio: false },
            { path: 'c.mp4', durationSeconds: 10, hasAudio: true },
            { path: 'd.mp4', durationSeconds: 5, hasAudio: true },
        ], 0.3, options);

        const names = filterNames(plan.filterGraph);
        expect(names).not.toContain('xfade');
        expect(names.filter(name => !FFMPEG_4_1_FILTERS.has(name))).toEqual([]);
        expect(plan.expectedDurationSeconds).toBe(24.1);
    });

    it('should pad short audio to the clip length and synthesise silence for clips without audio', () => {
        const plan = buildCrossfadePlan([
            { path: 'a.mp4', durationSeconds: 5, hasAudio: true },
            { path: 'b.mp4', durationSeconds: 4, hasAudio: false },
        ], 0.3, options);

        expect(plan.filterGraph).toContain('anullsrc=channel_layout=stereo:sample_rate=44100,atrim=0:4.000[a1]');
        expect(plan.filterGraph).toContain('[0:a]aformat=sample_rates=44100:channel_layouts=stereo,apad,atrim=0:5.000,asetpts=PTS-STARTPTS[a0]');
    });

    it('should reject fewer than two clips', () => {
        expect(() => buildCrossfadePlan([ { path: 'a.mp4', durationSeconds: 5, hasAudio: true } ], 0.3, options))
            .toThrow(AssemblyError);
    });

    it('should reject a clip no longer than the transition', () => {
        expect(() => buildCrossfadePlan([
            { path: 'a.mp4', durationSeconds: 5, hasAudio: true },
            { path: 'b.mp4', durationSeconds: 0.3, hasAudio: true },
        ], 0.3, options)).toThrow('Clip shorter than the transition');
    });
});
