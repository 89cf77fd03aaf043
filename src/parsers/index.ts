/**
 * Document parser dispatch
 *
 * Parsers are chosen by the format the adapter declared for each
 * document, never by sniffing the content.
 */

import type {
  DocumentFormat,
  ParseOutcome,
  ParsedPayload,
  PartialFieldMap,
  RawDocument,
  RawPayload,
} from "@/types";
import { errorMessage } from "@/errors";
import { parseHtml } from "./htmlParser";
import { parsePdf } from "./pdfParser";
import { parseXml } from "./xmlParser";

export type DocumentParser = (document: RawDocument) => Promise<ParseOutcome>;

export const DOCUMENT_PARSERS: Record<DocumentFormat, DocumentParser> = {
  html: parseHtml,
  pdf: parsePdf,
  xml: parseXml,
};

/**
 * Parse one document with the parser registered for its declared format
 *
 * A parser that throws is reported as MalformedResponse.
 */
export async function parseDocument(
  document: RawDocument,
  parsers: Record<DocumentFormat, DocumentParser> = DOCUMENT_PARSERS,
): Promise<ParseOutcome> {
  try {
    return await parsers[document.format](document);
  } catch (err) {
    return {
      ok: false,
      failure: {
        kind: "MalformedResponse",
        detail: `${document.format} parser failed: ${errorMessage(err)}`,
      },
    };
  }
}

/**
 * Parse every document of a payload
 *
 * Field maps are merged in document order (first document wins per
 * field). Every fetched document contributes its artifact reference and
 * raw content, whether or not it parsed.
 */
export async function parsePayload(
  payload: RawPayload,
  parsers: Record<DocumentFormat, DocumentParser> = DOCUMENT_PARSERS,
): Promise<ParsedPayload> {
  const result: ParsedPayload = {
    fields: {},
    artifacts: [],
    parsedDocuments: 0,
    failures: [],
  };

  for (const document of payload.documents) {
    const outcome = await parseDocument(document, parsers);

    result.artifacts.push({
      source: payload.source,
      field: document.artifactField,
      reference: document.reference,
      format: document.format,
      content: document.body,
    });

    if (!outcome.ok) {
      result.failures.push({ ...outcome.failure, reference: document.reference });
      continue;
    }

    result.parsedDocuments++;
    result.fields = mergeDocumentFields(result.fields, outcome.fields);
  }

  for (const document of payload.documents) {
    if (result.fields[document.artifactField] === undefined) {
      result.fields[document.artifactField] = document.reference;
    }
  }

  return result;
}

function mergeDocumentFields(
  current: PartialFieldMap,
  next: PartialFieldMap,
): PartialFieldMap {
  return { ...next, ...current };
}

export { parseHtml } from "./htmlParser";
export { parsePdf } from "./pdfParser";
export { parseXml } from "./xmlParser";
