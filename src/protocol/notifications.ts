import type { Artifact } from "../artifacts/index.js";
import { renderArtifactSummary } from "../renderers/artifact-summary.js";
import { createRequestMessage } from "./message.js";
import { createMultipartMessage } from "./multipart.js";
import { createDataPart, createTextPart } from "./parts.js";
import type { JsonObject, Message, MessageOpts } from "./types.js";

/**
 * ARTIFACT_CREATED announcement: a markdown summary part for readers and
 * a data part with the reference a recipient needs to fetch it.
 */
export function createArtifactCreatedMessage(
  sender: string,
  recipients: string[],
  artifact: Artifact,
  opts: MessageOpts = {},
): Message {
  return createMultipartMessage(
    sender,
    recipients,
    [
      createTextPart(renderArtifactSummary(artifact), {
        content_type: "text/markdown",
      }),
      createDataPart({
        artifact_id: artifact.id,
        artifact_type: artifact.artifact_type,
        version: artifact.current_version,
        checksum: artifact.metadata.checksum,
      }),
    ],
    { ...opts, message_type: "artifact_created" },
  );
}

/** ARTIFACT_REQUESTED: ask the holder for an artifact (optionally a version). */
export function createArtifactRequestedMessage(
  sender: string,
  recipients: string[],
  artifactId: string,
  opts: MessageOpts & { version?: string } = {},
): Message {
  const { version, ...messageOpts } = opts;
  const content: JsonObject = { artifact_id: artifactId };
  if (version !== undefined) content.version = version;
  return createRequestMessage(sender, recipients, content, {
    ...messageOpts,
    message_type: "artifact_requested",
  });
}
