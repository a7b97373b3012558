import type { Artifact, ArtifactContent } from "../artifacts/index.js";

const PREVIEW_CHARS = 500;

/**
 * Renders an Artifact as markdown for agents that only need the gist:
 * headline facts, description, tags and a bounded content preview.
 */
export function renderArtifactSummary(artifact: Artifact): string {
  const { metadata } = artifact;
  const sections: string[] = [];

  sections.push(`## ${metadata.title || "(untitled)"}`);

  sections.push(
    [
      `**Type:** ${artifact.artifact_type}`,
      `**Status:** ${artifact.status}`,
      `**Version:** ${artifact.current_version}`,
      `**Author:** ${metadata.author}`,
      `**Quality:** ${artifact.quality_score.toFixed(1)}`,
    ].join("\n"),
  );

  if (metadata.description) {
    sections.push(metadata.description);
  }

  if (metadata.tags.length > 0) {
    sections.push(`**Tags:** ${metadata.tags.join(", ")}`);
  }

  sections.push(renderContentPreview(artifact.content, metadata.size));

  return sections.join("\n\n");
}

function renderContentPreview(content: ArtifactContent, size: number): string {
  if (typeof content === "string") {
    return `### Content\n${truncate(content)}`;
  }
  if (content instanceof Uint8Array) {
    return `### Content\n_Binary content, ${size} bytes_`;
  }
  const json = truncate(JSON.stringify(content, null, 2));
  return `### Content\n\`\`\`json\n${json}\n\`\`\``;
}

function truncate(text: string): string {
  return text.length > PREVIEW_CHARS
    ? `${text.slice(0, PREVIEW_CHARS)}…`
    : text;
}
