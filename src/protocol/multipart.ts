import { ulid } from "ulid";
import {
  createMessage,
  createResponseMessage,
  type ResponseOpts,
} from "./message.js";
import {
  createDataPart,
  createTextPart,
  type PartOpts,
  partContentAsData,
  partContentAsText,
} from "./parts.js";
import type {
  JsonObject,
  Message,
  MessageContent,
  MessageOpts,
  Part,
  PartType,
} from "./types.js";

const BOUNDARY_PATTERN = /boundary="([^"]+)"/;

function multipartContentType(boundary: string): string {
  return `multipart/mixed; boundary="${boundary}"`;
}

export function createMultipartMessage(
  sender: string,
  recipients: string[],
  parts: Part[] = [],
  opts: MessageOpts & { boundary?: string } = {},
): Message {
  const boundary = opts.boundary ?? `boundary_${ulid()}`;
  return createMessage({
    ...opts,
    sender,
    recipients,
    parts,
    content_type: multipartContentType(boundary),
  });
}

export function createMultipartResponse(
  original: Message,
  parts: Part[],
  opts: ResponseOpts = {},
): Message {
  const response = createResponseMessage(original, "", opts);
  delete response.content;
  response.parts = [...parts];
  response.headers.content_type = multipartContentType(`boundary_${ulid()}`);
  return response;
}

export function getBoundary(message: Message): string | undefined {
  return BOUNDARY_PATTERN.exec(message.headers.content_type)?.[1];
}

export function addPart(message: Message, part: Part): void {
  if (message.parts === undefined) {
    message.parts = [];
    message.headers.content_type = multipartContentType(`boundary_${ulid()}`);
  }
  message.parts.push(part);
}

export function addTextPart(
  message: Message,
  content: string,
  opts?: PartOpts,
): Part {
  const part = createTextPart(content, opts);
  addPart(message, part);
  return part;
}

export function addDataPart(
  message: Message,
  content: JsonObject,
  opts?: PartOpts,
): Part {
  const part = createDataPart(content, opts);
  addPart(message, part);
  return part;
}

export function getPart(message: Message, partId: string): Part | undefined {
  return message.parts?.find((p) => p.id === partId);
}

export function getPartsByType(message: Message, type: PartType): Part[] {
  return (message.parts ?? []).filter((p) => p.type === type);
}

export function getTextParts(message: Message): Part[] {
  return getPartsByType(message, "text");
}

export function getDataParts(message: Message): Part[] {
  return getPartsByType(message, "data");
}

export function getFileParts(message: Message): Part[] {
  return getPartsByType(message, "file");
}

export function removePart(message: Message, partId: string): boolean {
  const index = message.parts?.findIndex((p) => p.id === partId) ?? -1;
  if (index < 0 || message.parts === undefined) return false;
  message.parts.splice(index, 1);
  return true;
}

export function getTotalSize(message: Message): number {
  return (message.parts ?? []).reduce((sum, p) => sum + p.size, 0);
}

export function getPartCount(message: Message): number {
  return message.parts?.length ?? 0;
}

export function hasParts(message: Message): boolean {
  return getPartCount(message) > 0;
}

export function isSinglePart(message: Message): boolean {
  return getPartCount(message) === 1;
}

/**
 * Main payload: the first DATA part, else the first TEXT part.
 * A DATA part whose content is not a JSON object yields its text.
 */
export function getMainContent(message: Message): MessageContent | undefined {
  const data = getDataParts(message)[0];
  if (data) return partContentAsData(data) ?? partContentAsText(data);

  const text = getTextParts(message)[0];
  if (text) return partContentAsText(text);

  return undefined;
}

/** All TEXT parts joined with newlines, in message order. */
export function getTextContent(message: Message): string {
  return getTextParts(message).map(partContentAsText).join("\n");
}
