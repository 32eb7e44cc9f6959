/**
 * Upload Validator
 *
 * Rejects bad image uploads before any staging or inference happens.
 */

import { ValidationError } from "../errors.js";

/**
 * An upload buffered once and readable any number of times from its start
 */
export class BufferedUpload {
  constructor(
    public readonly filename: string,
    private readonly content: Buffer,
    /** Set when the multipart parser stopped reading at its size limit */
    public readonly truncated: boolean = false,
  ) {}

  get size(): number {
    return this.content.byteLength;
  }

  /**
   * Full content from offset zero. Measuring the size through `read()` does
   * not consume the upload for later readers.
   */
  async read(): Promise<Buffer> {
    return this.content;
  }

  static async fromStream(
    filename: string,
    stream: AsyncIterable<Buffer>,
    truncated: () => boolean = () => false,
  ): Promise<BufferedUpload> {
    const chunks: Buffer[] = [];
    for await (const chunk of stream) {
      chunks.push(chunk);
    }
    return new BufferedUpload(filename, Buffer.concat(chunks), truncated());
  }
}

export interface UploadRules {
  supportedFormats: readonly string[];
  maxUploadBytes: number;
}

export function fileExtension(filename: string): string {
  return (filename.split(".").pop() ?? "").toLowerCase();
}

function formatMegabytes(bytes: number): string {
  return `${Math.round((bytes / (1024 * 1024)) * 100) / 100}MB`;
}

/**
 * Validate an uploaded image
 *
 * @returns the lowercase extension of the accepted upload
 * @throws ValidationError with the reason shown to the client
 */
export async function validateUpload(
  upload: BufferedUpload,
  rules: UploadRules,
): Promise<string> {
  if (!upload.filename) {
    throw new ValidationError("No filename provided");
  }

  const ext = fileExtension(upload.filename);
  if (!rules.supportedFormats.includes(ext)) {
    throw new ValidationError(
      `Unsupported format. Supported: ${rules.supportedFormats.join(", ")}`,
    );
  }

  const content = await upload.read();
  if (upload.truncated || content.byteLength > rules.maxUploadBytes) {
    throw new ValidationError(
      `File too large (max ${formatMegabytes(rules.maxUploadBytes)})`,
    );
  }

  return ext;
}
