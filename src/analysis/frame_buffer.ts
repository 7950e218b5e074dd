import type { CameraFrame, RotationDegrees, StillImage } from '../kernel/hand_types';

const BYTES_PER_PIXEL = 4;

export function isRotation(degrees: number): degrees is RotationDegrees {
    return degrees === 0 || degrees === 90 || degrees === 180 || degrees === 270;
}

/**
 * Rotates a packed RGBA image clockwise. Always returns a new image.
 */
export function rotateRgba(image: StillImage, degrees: RotationDegrees): StillImage {
    const { width, height, data } = image;
    if (degrees === 0) {
        return { width, height, data: data.slice() };
    }

    const swap = degrees === 90 || degrees === 270;
    const outWidth = swap ? height : width;
    const outHeight = swap ? width : height;
    const out = new Uint8ClampedArray(data.length);

    for (let y = 0; y < height; y++) {
        for (let x = 0; x < width; x++) {
            let dx: number;
            let dy: number;
            switch (degrees) {
                case 90:
                    dx = height - 1 - y;
                    dy = x;
                    break;
                case 180:
                    dx = width - 1 - x;
                    dy = height - 1 - y;
                    break;
                default: // 270
                    dx = y;
                    dy = width - 1 - x;
                    break;
            }
            const src = (y * width + x) * BYTES_PER_PIXEL;
            const dst = (dy * outWidth + dx) * BYTES_PER_PIXEL;
            out[dst] = data[src];
            out[dst + 1] = data[src + 1];
            out[dst + 2] = data[src + 2];
            out[dst + 3] = data[src + 3];
        }
    }

    return { width: outWidth, height: outHeight, data: out };
}

/**
 * Copies camera frames out of the source's buffers so the frame can be
 * released straight away. Extraction then works on the owned copy, which
 * decouples camera back-pressure from extraction latency.
 */
export class FrameBuffer {
    private framesCaptured = 0;

    /**
     * Copies, uprights and releases `frame`. The frame is closed even when the
     * copy fails.
     */
    public capture(frame: CameraFrame): StillImage {
        try {
            return rotateRgba(this.copyPixels(frame), this.rotationOf(frame));
        } finally {
            frame.close();
        }
    }

    public get captured(): number {
        return this.framesCaptured;
    }

    private rotationOf(frame: CameraFrame): RotationDegrees {
        const degrees = ((frame.rotationDegrees % 360) + 360) % 360;
        if (!isRotation(degrees)) {
            throw new Error(`FrameBuffer: unsupported rotation ${frame.rotationDegrees}°.`);
        }
        return degrees;
    }

    private copyPixels(frame: CameraFrame): StillImage {
        if (frame.format !== 'RGBA_8888') {
            throw new Error(`FrameBuffer: unsupported pixel format ${String(frame.format)}.`);
        }
        const plane = frame.planes[0];
        if (!plane) {
            throw new Error('FrameBuffer: frame has no pixel planes.');
        }

        const { width, height } = frame;
        const { buffer, rowStride, pixelStride } = plane;
        const lastByte = (height - 1) * rowStride + (width - 1) * pixelStride + BYTES_PER_PIXEL;
        if (width <= 0 || height <= 0 || pixelStride < BYTES_PER_PIXEL || buffer.length < lastByte) {
            throw new Error(
                `FrameBuffer: plane of ${buffer.length} bytes cannot hold ${width}x${height} ` +
                `(rowStride ${rowStride}, pixelStride ${pixelStride}).`
            );
        }

        const data = new Uint8ClampedArray(width * height * BYTES_PER_PIXEL);
        if (pixelStride === BYTES_PER_PIXEL && rowStride === width * BYTES_PER_PIXEL) {
            data.set(buffer.subarray(0, data.length));
        } else {
            for (let y = 0; y < height; y++) {
                for (let x = 0; x < width; x++) {
                    const src = y * rowStride + x * pixelStride;
                    data.set(buffer.subarray(src, src + BYTES_PER_PIXEL), (y * width + x) * BYTES_PER_PIXEL);
                }
            }
        }
        this.framesCaptured++;
        return { width, height, data };
    }
}
