import { z } from 'zod';
import type { ExtensionInfo } from '@shared/contracts';
import { VersionManifest } from '@main/services/manifest/VersionManifest';

const optionalText = z.string().nullish().transform((value) => value ?? null);

const extensionInfoSchema = z.object({
  name: optionalText,
  version: optionalText,
  author: optionalText,
  authorUrl: optionalText,
  extensionUrl: optionalText,
  targetAppName: optionalText,
  targetAppVersion: optionalText,
  shortDescription: optionalText,
  longDescription: optionalText,
  releaseNotes: optionalText,
  customFields: z
    .record(z.string())
    .nullish()
    .transform((value) => value ?? {})
});

const extensionVersionSchema = z.object({
  extInfo: extensionInfoSchema.nullish().transform((value): ExtensionInfo | null => value ?? null),
  downloadPath: z.string().min(1),
  signaturePath: optionalText,
  screenshots: z.array(z.string().min(1)).nullish().transform((value) => value ?? [])
});

const extensionSchema = z.object({
  name: z.string().min(1),
  versions: z.array(extensionVersionSchema).nullish().transform((value) => value ?? [])
});

const applicationVersionSchema = z.object({
  version: z.string().min(1),
  extensions: z.array(extensionSchema).nullish().transform((value) => value ?? [])
});

const manifestSchema = z.object({
  manifestGenerated: z.string().datetime({ offset: true }),
  applicationName: z.string(),
  applicationVersions: z.array(applicationVersionSchema).nullish().transform((value) => value ?? [])
});

export type ManifestParseResult = { ok: true; manifest: VersionManifest } | { ok: false; error: string };

export class ManifestValidator {
  validate(input: unknown): ManifestParseResult {
    const parsed = manifestSchema.safeParse(input);
    if (!parsed.success) {
      return {
        ok: false,
        error: parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ')
      };
    }

    const { manifestGenerated, applicationName, applicationVersions } = parsed.data;
    return {
      ok: true,
      manifest: new VersionManifest({
        manifestGenerated: new Date(manifestGenerated),
        applicationName,
        applicationVersions
      })
    };
  }

  parse(json: string): ManifestParseResult {
    let raw: unknown;
    try {
      raw = JSON.parse(json);
    } catch (error) {
      return {
        ok: false,
        error: `invalid JSON: ${error instanceof Error ? error.message : String(error)}`
      };
    }

    return this.validate(raw);
  }
}

export function parseManifest(json: string): ManifestParseResult {
  return new ManifestValidator().parse(json);
}
