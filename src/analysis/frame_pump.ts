import type { CameraFrame } from '../kernel/hand_types';

export interface FrameSink {
    analyze(frame: CameraFrame): Promise<void>;
}

/**
 * Drives a frame source into a sink with full back-pressure: the next frame
 * is pulled only after the previous one has been analyzed. Once `signal`
 * aborts, the pending frame is released unanalyzed and the pump stops.
 *
 * @returns the number of frames handed to the sink
 */
export async function pumpFrames(
    source: AsyncIterable<CameraFrame>,
    sink: FrameSink,
    signal?: AbortSignal
): Promise<number> {
    let delivered = 0;
    for await (const frame of source) {
        if (signal?.aborted) {
            frame.close();
            break;
        }
        delivered++;
        await sink.analyze(frame);
    }
    return delivered;
}
