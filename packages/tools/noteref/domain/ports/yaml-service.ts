/**
 * Port: YamlService
 *
 * Abstracts YAML parsing so the domain does not depend on a specific
 * YAML library.
 */
export interface YamlService {
  /** Parse a YAML string (block content without delimiters) into an object */
  parse(yaml: string): Record<string, unknown>;
}
