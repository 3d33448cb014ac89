import { z } from 'zod';
import { AppError, ErrorCode } from './error-handling';
import { callWithRetry, COLLABORATOR_RETRY, withTimeout } from './retry-strategy';
import { trackApiCall } from './monitoring';
import type { CropResult, SubjectCropper } from './ports';

const cropResponseSchema = z.object({
  cropped_image: z.string().nullish(),
  thumbnail: z.string().nullish(),
});

const CROP_TIMEOUT_MS = 60000; // cold starts on the GPU host are slow

/**
 * Background removal and square thumbnail from a remote ML endpoint.
 * The endpoint takes `{ image_base64 }` and answers with base64 images,
 * or nulls when it found no foreground subject.
 */
export class RemoteSubjectCropper implements SubjectCropper {
  constructor(private readonly endpointUrl: string, private readonly timeoutMs: number = CROP_TIMEOUT_MS) {}

  async cropSubject(bytes: Uint8Array): Promise<CropResult> {
    return trackApiCall('preprocessing', () =>
      callWithRetry('SubjectCrop', () => this.request(bytes), COLLABORATOR_RETRY.preprocessing)
    );
  }

  private async request(bytes: Uint8Array): Promise<CropResult> {
    const response = await withTimeout(
      fetch(this.endpointUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ image_base64: Buffer.from(bytes).toString('base64') }),
      }),
      this.timeoutMs
    );

    if (!response.ok) {
      throw new AppError(
        ErrorCode.COLLABORATOR_UNAVAILABLE,
        new Error(`Subject crop error: ${response.status} ${response.statusText}`),
        { httpStatus: response.status }
      );
    }

    const parsed = cropResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new AppError(ErrorCode.COLLABORATOR_UNAVAILABLE, new Error('Invalid response from subject crop endpoint'));
    }

    const { cropped_image, thumbnail } = parsed.data;
    if (!cropped_image || !thumbnail) {
      return { croppedBytes: bytes, thumbnailBytes: bytes, found: false };
    }

    return {
      croppedBytes: new Uint8Array(Buffer.from(cropped_image, 'base64')),
      thumbnailBytes: new Uint8Array(Buffer.from(thumbnail, 'base64')),
      found: true,
    };
  }
}

/**
 * Used when no crop endpoint is configured: the full image is the subject.
 */
export class PassthroughCropper implements SubjectCropper {
  async cropSubject(bytes: Uint8Array): Promise<CropResult> {
    return { croppedBytes: bytes, thumbnailBytes: bytes, found: false };
  }
}
