/**
 * Error types raised by the OLX import/export layer.
 *
 * Every error carries a machine-readable code in the same `E-<AREA>-<REASON>` form used by
 * the validation gates, plus structured data for reporting. Only
 * UnresolvedContentReference, MalformedDefinition and XmlParseError abort an import;
 * the others are recorded or logged where they occur.
 */

export const OLX_ERROR_CODES = {
  UNRESOLVED_REFERENCE: 'E-OLX-UNRESOLVED-REFERENCE',
  MALFORMED_DEFINITION: 'E-OLX-MALFORMED-DEFINITION',
  MALFORMED_METADATA: 'E-OLX-MALFORMED-METADATA',
  UNKNOWN_FIELD: 'W-OLX-UNKNOWN-FIELD',
  FIELD_TYPE: 'E-OLX-FIELD-TYPE',
  SERIALIZATION: 'E-OLX-SERIALIZATION',
  XML_PARSE: 'E-OLX-XML-PARSE',
  RESOURCE_NOT_FOUND: 'E-OLX-RESOURCE-NOT-FOUND',
  UNKNOWN_BLOCK_TYPE: 'E-OLX-UNKNOWN-BLOCK-TYPE',
} as const;

export type OlxErrorCode = typeof OLX_ERROR_CODES[keyof typeof OLX_ERROR_CODES];

export class OlxError extends Error {
  constructor(
    readonly code: OlxErrorCode,
    message: string,
    readonly data: Record<string, unknown> = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * A pointer's definition file (or a file named by a `filename` attribute) could not be
 * read or parsed. Fatal to the import of that one node.
 */
export class UnresolvedContentReference extends OlxError {
  constructor(readonly path: string, readonly definitionId: string, cause: unknown) {
    super(
      OLX_ERROR_CODES.UNRESOLVED_REFERENCE,
      `Unable to load file contents at path ${path} for item ${definitionId}: ${describeError(cause)}`,
      { path, definitionId },
      { cause }
    );
  }
}

export class MalformedDefinition extends OlxError {
  constructor(message: string, data: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(OLX_ERROR_CODES.MALFORMED_DEFINITION, message, data, options);
  }
}

export class MalformedEmbeddedMetadata extends OlxError {
  constructor(readonly raw: string, reason: string) {
    super(OLX_ERROR_CODES.MALFORMED_METADATA, reason, { raw });
  }
}

export class FieldTypeError extends OlxError {
  constructor(readonly fieldName: string, readonly typeName: string, value: unknown) {
    super(
      OLX_ERROR_CODES.FIELD_TYPE,
      `Value ${JSON.stringify(value)} is not valid for ${typeName} field ${fieldName}`,
      { fieldName, typeName, value }
    );
  }
}

export class SerializationFailure extends OlxError {
  constructor(readonly attribute: string, cause: unknown) {
    super(
      OLX_ERROR_CODES.SERIALIZATION,
      `Failed to serialize value for ${attribute}: ${describeError(cause)}`,
      { attribute },
      { cause }
    );
  }
}

export class XmlParseError extends OlxError {
  constructor(message: string, readonly line?: number, readonly col?: number) {
    super(OLX_ERROR_CODES.XML_PARSE, message, { line, col });
  }
}

export class ResourceNotFoundError extends OlxError {
  constructor(readonly path: string) {
    super(OLX_ERROR_CODES.RESOURCE_NOT_FOUND, `Resource not found: ${path}`, { path });
  }
}

export class UnknownBlockTypeError extends OlxError {
  constructor(readonly category: string, known: string[]) {
    super(OLX_ERROR_CODES.UNKNOWN_BLOCK_TYPE, `No block type registered for <${category}>`, { category, known });
  }
}
