import { describe, it, expect } from '@jest/globals';
import { pumpFrames, FrameSink } from '../../src/analysis/frame_pump';
import type { CameraFrame } from '../../src/kernel/hand_types';
import { makeFrame } from '../helpers/fakes';

async function* framesFrom<T extends CameraFrame>(frames: T[], log: string[]): AsyncGenerator<T> {
    for (const [idx, frame] of frames.entries()) {
        log.push(`deliver:${idx}`);
        yield frame;
    }
}

describe('pumpFrames', () => {
    it('pulls the next frame only after the previous one was analyzed', async () => {
        const log: string[] = [];
        const frames = [makeFrame(), makeFrame(), makeFrame()];
        const sink: FrameSink = {
            analyze: async frame => {
                log.push(`analyze:${frames.findIndex(f => f === frame)}`);
                await new Promise<void>(resolve => setImmediate(resolve));
                log.push('done');
            },
        };

        const delivered = await pumpFrames(framesFrom(frames, log), sink);

        expect(delivered).toBe(3);
        expect(log).toEqual([
            'deliver:0', 'analyze:0', 'done',
            'deliver:1', 'analyze:1', 'done',
            'deliver:2', 'analyze:2', 'done',
        ]);
    });

    it('stops on abort and releases the pending frame unanalyzed', async () => {
        const controller = new AbortController();
        const frames = [makeFrame(), makeFrame(), makeFrame()];
        const analyzed: CameraFrame[] = [];
        const sink: FrameSink = {
            analyze: async frame => {
                analyzed.push(frame);
                frame.close();
                controller.abort();
            },
        };

        const delivered = await pumpFrames(framesFrom(frames, []), sink, controller.signal);

        expect(delivered).toBe(1);
        expect(analyzed).toEqual([frames[0]]);
        expect(frames[1].close).toHaveBeenCalledTimes(1);
        expect(frames[2].close).not.toHaveBeenCalled();
    });
});
