/**
 * Adapter: Sha256SlugService
 *
 * SlugService backed by node:crypto.
 *   - slugify: lowercase, letters and digits kept, any other run -> "-",
 *     no leading or trailing dash
 *   - hashSource: SHA-256 hex digest, abbreviated to 12 characters
 *
 * Dependencies: node:crypto.
 */

import { createHash } from "node:crypto";
import type { SlugService } from "../../domain/ports/slug-service.js";

export const SOURCE_HASH_LENGTH = 12;

export class Sha256SlugService implements SlugService {
  slugify(text: string): string {
    return text
      .toLowerCase()
      .replace(/[^\p{L}\p{N}]+/gu, "-")
      .replace(/^-+|-+$/g, "");
  }

  hashSource(text: string): string {
    return createHash("sha256")
      .update(text, "utf8")
      .digest("hex")
      .slice(0, SOURCE_HASH_LENGTH);
  }
}
