/**
 * Manifest Parser
 * @module source/manifest-parser
 *
 * Splits YAML and JSON files into resource documents. Multi-document YAML is
 * split on `---`; `kind: List` documents are expanded into their items.
 */

import * as yaml from 'yaml';
import { MalformedResourceError, getErrorMessage } from '../errors/index.js';
import {
  JsonObject,
  JsonValue,
  getMetadata,
  isJsonObject,
  toJsonValue,
} from '../types/resource.js';

export interface ParsedDocument {
  manifest: JsonObject;
  /** Path relative to the repository root */
  file: string;
  documentIndex: number;
}

export interface ParsedFile {
  documents: ParsedDocument[];
  errors: MalformedResourceError[];
}

/**
 * Returns a reason when the value is not a resource manifest
 */
function validateDocument(value: JsonValue): string | null {
  if (!isJsonObject(value)) {
    return 'document is not a mapping';
  }
  if (typeof value.apiVersion !== 'string' || value.apiVersion === '') {
    return 'missing apiVersion';
  }
  if (typeof value.kind !== 'string' || value.kind === '') {
    return 'missing kind';
  }
  const name = getMetadata(value).name;
  if (typeof name !== 'string' || name === '') {
    return 'missing metadata.name';
  }
  return null;
}

function collect(
  value: JsonValue,
  file: string,
  documentIndex: number,
  result: ParsedFile
): void {
  if (isJsonObject(value) && value.kind === 'List' && Array.isArray(value.items)) {
    value.items.forEach((item, itemIndex) => {
      const reason = validateDocument(item);
      if (reason !== null || !isJsonObject(item)) {
        result.errors.push(new MalformedResourceError(
          `${file}#${documentIndex} item ${itemIndex}: ${reason ?? 'invalid item'}`,
          file,
          documentIndex
        ));
        return;
      }
      result.documents.push({ manifest: item, file, documentIndex });
    });
    return;
  }

  const reason = validateDocument(value);
  if (reason !== null || !isJsonObject(value)) {
    result.errors.push(new MalformedResourceError(
      `${file}#${documentIndex}: ${reason ?? 'invalid document'}`,
      file,
      documentIndex
    ));
    return;
  }
  result.documents.push({ manifest: value, file, documentIndex });
}

/**
 * Parses one manifest file. Per-document failures are returned, never thrown.
 */
export function parseManifestFile(content: string, file: string): ParsedFile {
  const result: ParsedFile = { documents: [], errors: [] };

  if (file.toLowerCase().endsWith('.json')) {
    try {
      const parsed: unknown = JSON.parse(content);
      const value = toJsonValue(parsed);
      if (value !== undefined) {
        collect(value, file, 0, result);
      }
    } catch (error) {
      result.errors.push(new MalformedResourceError(
        `${file}#0: invalid JSON: ${getErrorMessage(error)}`,
        file,
        0
      ));
    }
    return result;
  }

  const documents = yaml.parseAllDocuments(content, { strict: false, uniqueKeys: false });

  documents.forEach((doc, documentIndex) => {
    if (doc.errors.length > 0) {
      const first = doc.errors[0];
      result.errors.push(new MalformedResourceError(
        `${file}#${documentIndex}: invalid YAML: ${first?.message ?? 'parse error'}`,
        file,
        documentIndex
      ));
      return;
    }

    const parsed: unknown = doc.toJS();
    if (parsed === null || parsed === undefined) {
      return;
    }
    const value = toJsonValue(parsed);
    if (value !== undefined) {
      collect(value, file, documentIndex, result);
    }
  });

  return result;
}
