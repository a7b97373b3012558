import { Artifact } from "./artifact.js";
import type {
  ArtifactContent,
  ArtifactPriority,
  ArtifactType,
} from "./types.js";

export interface CreateArtifactOpts {
  title: string;
  description?: string;
  author: string;
  tags?: string[];
  priority?: ArtifactPriority;
  format?: string;
  category?: string;
  custom_fields?: Record<string, unknown>;
  expires_at?: number;
}

export function createArtifact(
  artifactType: ArtifactType,
  content: ArtifactContent,
  opts: CreateArtifactOpts,
): Artifact {
  return new Artifact({
    artifact_type: artifactType,
    content,
    priority: opts.priority,
    expires_at: opts.expires_at,
    metadata: {
      title: opts.title,
      description: opts.description ?? "",
      author: opts.author,
      tags: opts.tags ?? [],
      format: opts.format,
      category: opts.category,
      custom_fields: opts.custom_fields ?? {},
    },
  });
}

export function createReportArtifact(
  content: Record<string, unknown>,
  opts: CreateArtifactOpts,
): Artifact {
  return createArtifact("report", content, opts);
}

export function createRecommendationArtifact(
  content: Record<string, unknown>,
  opts: CreateArtifactOpts,
): Artifact {
  return createArtifact("recommendation", content, opts);
}

/** Binary image content; format defaults to "png". */
export function createVisualizationArtifact(
  content: Uint8Array,
  opts: CreateArtifactOpts,
): Artifact {
  return createArtifact("visualization", content, {
    ...opts,
    format: opts.format ?? "png",
  });
}
