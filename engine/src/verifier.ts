/**
 * phpforge Engine — SHA-256 Checksum Verification
 *
 * Composer publishes a sha256sum file next to every phar; the downloaded
 * phar is only installed when it matches.
 */

import * as fs from "fs";
import * as crypto from "crypto";

export interface VerificationResult {
  valid: boolean;
  expected: string;
  actual: string;
  file_path: string;
}

/**
 * Compute SHA-256 hash of a file by streaming it.
 */
export async function computeFileHash(filePath: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = crypto.createHash("sha256");
    const stream = fs.createReadStream(filePath);

    stream.on("data", (chunk) => hash.update(chunk));
    stream.on("end", () => resolve(hash.digest("hex")));
    stream.on("error", (err) =>
      reject(new Error(`Failed to read file for hashing: ${err.message}`)),
    );
  });
}

/**
 * Extract the hash from sha256sum(1) output ("<hash>  <filename>").
 *
 * @throws Error if the first field is not a 64-character hex string
 */
export function parseChecksumFile(content: string): string {
  const hash = content.trim().split(/\s+/)[0]?.toLowerCase() ?? "";
  if (!/^[a-f0-9]{64}$/.test(hash)) {
    throw new Error(`Checksum file does not start with a SHA-256 hash`);
  }
  return hash;
}

/**
 * Verify a file's SHA-256 checksum against an expected value.
 */
export async function verifyChecksum(
  filePath: string,
  expectedHash: string,
): Promise<VerificationResult> {
  const normalizedExpected = expectedHash.toLowerCase().trim();

  if (!/^[a-f0-9]{64}$/.test(normalizedExpected)) {
    throw new Error(
      `Invalid SHA-256 hash format: "${expectedHash}". Expected 64 hex characters.`,
    );
  }

  if (!fs.existsSync(filePath)) {
    throw new Error(`File not found: ${filePath}`);
  }

  const actual = await computeFileHash(filePath);

  return {
    valid: actual === normalizedExpected,
    expected: normalizedExpected,
    actual,
    file_path: filePath,
  };
}
