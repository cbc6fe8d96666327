import { ValidationError } from "../errors";
import type { ImageConfig, ImageSpec } from "../core/workflow/serialization";

export const DEFAULT_IMAGE_NAME = "default";

const IMAGE_NAME_PATTERN = /^[A-Za-z0-9_.-]+$/;

/**
 * Parses `repo:tag`, `repo@sha256:digest` or `name=reference`. A colon before
 * the last slash belongs to a registry port, not a tag.
 */
export function parseImageSpec(value: string): ImageSpec {
  const trimmed = value.trim();
  const assignment = trimmed.indexOf("=");
  const name = assignment === -1 ? DEFAULT_IMAGE_NAME : trimmed.slice(0, assignment);
  const reference = assignment === -1 ? trimmed : trimmed.slice(assignment + 1);

  if (!IMAGE_NAME_PATTERN.test(name)) {
    throw new ValidationError(`Invalid image name "${name}" in ${value}`);
  }

  const digestIndex = reference.indexOf("@");
  if (digestIndex !== -1) {
    const fqn = reference.slice(0, digestIndex);
    const digest = reference.slice(digestIndex + 1);
    if (fqn.length === 0 || !/^[a-z0-9]+:[A-Fa-f0-9]{32,}$/.test(digest)) {
      throw new ValidationError(`Incorrect image format ${value}`);
    }
    return { name, fqn, digest };
  }

  const tagIndex = reference.lastIndexOf(":");
  if (tagIndex <= reference.lastIndexOf("/")) {
    throw new ValidationError(
      `Image ${value} must carry a tag or digest (e.g. repo:tag)`
    );
  }

  const fqn = reference.slice(0, tagIndex);
  const tag = reference.slice(tagIndex + 1);
  if (fqn.length === 0 || !/^[\w][\w.-]{0,127}$/.test(tag)) {
    throw new ValidationError(`Incorrect image format ${value}`);
  }
  return { name, fqn, tag };
}

export function parseImageConfig(values: readonly string[]): ImageConfig {
  if (values.length === 0) {
    throw new ValidationError("At least one image must be configured.");
  }

  const images: ImageSpec[] = [];
  const seen = new Set<string>();
  for (const value of values) {
    const image = parseImageSpec(value);
    if (seen.has(image.name)) {
      throw new ValidationError(`Image ${image.name} is defined more than once.`);
    }
    seen.add(image.name);
    images.push(image);
  }

  const defaultImage =
    images.find((image) => image.name === DEFAULT_IMAGE_NAME) ?? images[0];
  return { defaultImage, images };
}
