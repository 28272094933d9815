/**
 * Adapter: YamlParserService
 *
 * Concrete YamlService implementation using js-yaml. Blank input and
 * documents that are not a mapping parse to an empty object; a syntax error
 * is reported as a malformed ledger.
 *
 * Dependencies: js-yaml.
 */

import { load } from "js-yaml";
import type { YamlService } from "../../domain/ports/yaml-service.js";
import { NoteError } from "../../domain/entities/errors.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class YamlParserService implements YamlService {
  parse(source: string): Record<string, unknown> {
    if (!source.trim()) {
      return {};
    }
    let result: unknown;
    try {
      result = load(source);
    } catch (e) {
      const reason = e instanceof Error ? e.message.split("\n")[0] : String(e);
      throw new NoteError("malformed_ledger", `Invalid YAML: ${reason}`);
    }
    return isRecord(result) ? result : {};
  }
}
