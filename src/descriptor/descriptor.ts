/**
 * App descriptor loading and serialization
 *
 * Validate once, at the boundary: everything downstream of
 * parseAppDescriptor can rely on every service having a string `image`.
 */

import { stringify } from "yaml";
import type { ZodIssue } from "zod";
import { InputError, type FileSystem } from "#/core";
import { AppDescriptorSchema, type AppDescriptor } from "#/schemas";
import { safeParseYamlDocument } from "#/friendly-errors";

function describeIssue(issue: ZodIssue): InputError {
  const [root, service, field] = issue.path;

  if (root === "services" && typeof service === "string") {
    if (field === "image") {
      const missing = issue.code === "invalid_type" && issue.received === "undefined";
      return new InputError(
        missing
          ? `Service(${service}) missing 'image' attribute`
          : `Service(${service}) invalid 'image' attribute`,
        service
      );
    }
    return new InputError(`Service(${service}) has invalid format`, service);
  }

  if (root === "services") {
    return new InputError("Descriptor 'services' must be a mapping of service name to service");
  }

  return new InputError(`Invalid descriptor: ${issue.message}`);
}

/**
 * Validate an already-parsed descriptor.
 * Throws InputError naming the first offending service.
 */
export function parseAppDescriptor(raw: unknown): AppDescriptor {
  const result = AppDescriptorSchema.safeParse(raw);
  if (result.success) {
    return result.data;
  }

  const [first] = result.error.issues;
  throw first ? describeIssue(first) : new InputError("Invalid descriptor");
}

/**
 * Read and validate a descriptor file.
 */
export function loadAppDescriptor(fs: FileSystem, path: string): AppDescriptor {
  if (!fs.exists(path)) {
    throw new InputError(`Descriptor not found: ${path}`);
  }

  const parsed = safeParseYamlDocument(fs.readFile(path), path);
  if (!parsed.success) {
    const detail = parsed.error.details?.[0];
    throw new InputError(detail ? `${parsed.error.message}: ${detail}` : parsed.error.message);
  }

  return parseAppDescriptor(parsed.data);
}

/**
 * Canonical text form: YAML with services in name order, so the same
 * descriptor always serializes to the same bytes.
 */
export function serializeAppDescriptor(descriptor: AppDescriptor): Buffer {
  const services = Object.fromEntries(
    Object.keys(descriptor.services)
      .sort()
      .flatMap((name) => {
        const service = descriptor.services[name];
        return service ? [[name, service] as const] : [];
      })
  );

  return Buffer.from(stringify({ ...descriptor, services }));
}
