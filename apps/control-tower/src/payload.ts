import sharp from "sharp";
import { errorMessage, PayloadError } from "@sct/contracts";

export type PayloadAttempt = {
  maxDimension: number;
  quality: number;
  sizeBytes: number;
};

export type PreparedPayload = {
  bytes: Buffer;
  mimeType: "image/jpeg";
  width: number;
  height: number;
  quality: number;
  maxDimension: number;
  withinBudget: boolean;
  originalBytes: number;
  attempts: PayloadAttempt[];
};

export type PreparePayloadOptions = {
  maxBytes?: number;
  startDimension?: number;
  minDimension?: number;
  startQuality?: number;
  minQuality?: number;
  qualityStep?: number;
  dimensionFactor?: number;
};

export type PayloadPreparer = (input: Buffer, options?: PreparePayloadOptions) => Promise<PreparedPayload>;

const DEFAULTS = {
  maxBytes: 500 * 1024,
  startDimension: 1024,
  minDimension: 256,
  startQuality: 85,
  minQuality: 60,
  qualityStep: 10,
  dimensionFactor: 0.8,
} satisfies Required<PreparePayloadOptions>;

async function encodeCandidate(
  input: Buffer,
  maxDimension: number,
  quality: number,
): Promise<{ data: Buffer; width: number; height: number }> {
  const { data, info } = await sharp(input)
    .removeAlpha()
    .toColourspace("srgb")
    .resize({
      width: maxDimension,
      height: maxDimension,
      fit: "inside",
      withoutEnlargement: true,
    })
    .jpeg({ quality })
    .toBuffer({ resolveWithObject: true });
  return { data, width: info.width, height: info.height };
}

/**
 * Re-encodes an uploaded image as three-channel JPEG under a byte budget.
 *
 * Greedy search: quality drops by `qualityStep` while it is above
 * `minQuality`; after that the bounding dimension shrinks by
 * `dimensionFactor` and quality resets. The dimension strictly decreases on
 * every outer step, so the loop ends once it falls below `minDimension`. If
 * nothing fits, the last (smallest) candidate is returned with
 * `withinBudget: false`.
 */
export async function preparePayload(input: Buffer, options: PreparePayloadOptions = {}): Promise<PreparedPayload> {
  const settings = { ...DEFAULTS, ...options };
  if (input.length === 0) {
    throw new PayloadError("image payload is empty");
  }

  try {
    const metadata = await sharp(input).metadata();
    if (!metadata.width || !metadata.height) {
      throw new PayloadError("image has no readable dimensions");
    }
  } catch (error) {
    if (error instanceof PayloadError) {
      throw error;
    }
    throw new PayloadError(`unsupported or corrupt image: ${errorMessage(error)}`, { cause: error });
  }

  const attempts: PayloadAttempt[] = [];
  let maxDimension = settings.startDimension;
  let quality = settings.startQuality;
  let last: PreparedPayload | null = null;

  while (maxDimension >= settings.minDimension) {
    let candidate: { data: Buffer; width: number; height: number };
    try {
      candidate = await encodeCandidate(input, maxDimension, quality);
    } catch (error) {
      throw new PayloadError(`image re-encoding failed: ${errorMessage(error)}`, { cause: error });
    }
    attempts.push({ maxDimension, quality, sizeBytes: candidate.data.length });
    last = {
      bytes: candidate.data,
      mimeType: "image/jpeg",
      width: candidate.width,
      height: candidate.height,
      quality,
      maxDimension,
      withinBudget: candidate.data.length <= settings.maxBytes,
      originalBytes: input.length,
      attempts,
    };
    if (last.withinBudget) {
      return last;
    }

    if (quality > settings.minQuality) {
      quality -= Math.max(1, settings.qualityStep);
    } else {
      maxDimension = Math.min(maxDimension - 1, Math.floor(maxDimension * settings.dimensionFactor));
      quality = settings.startQuality;
    }
  }

  if (!last) {
    throw new PayloadError(
      `start dimension ${settings.startDimension}px is below the ${settings.minDimension}px floor`,
    );
  }
  return last;
}
