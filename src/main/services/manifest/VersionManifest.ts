import type { AppVersion, ExtensionEntry, ExtensionVersion, ManifestQueryOptions } from '@shared/contracts';
import {
  compareVersions,
  isSnapshotVersion,
  majorVersionOf,
  versionComparator
} from '@main/services/versions/VersionOrdering';

export interface ManifestDocument {
  manifestGenerated: string;
  applicationName: string;
  applicationVersions: Array<{
    version: string;
    extensions: Array<{
      name: string;
      versions: Array<{
        extInfo: ExtensionVersion['extInfo'];
        downloadPath: string;
        signaturePath: string | null;
        screenshots: string[];
      }>;
    }>;
  }>;
}

interface VersionManifestInit {
  manifestGenerated: Date;
  applicationName: string;
  applicationVersions: AppVersion[];
}

type QualifiedExtensionVersion = ExtensionVersion & { extInfo: NonNullable<ExtensionVersion['extInfo']> & { version: string } };

/**
 * Parsed snapshot of a source's version manifest. The whole graph is frozen
 * on construction; every query returns a new array.
 */
export class VersionManifest {
  readonly manifestGenerated: Date;
  readonly applicationName: string;
  readonly applicationVersions: readonly AppVersion[];

  constructor(init: VersionManifestInit) {
    this.manifestGenerated = new Date(init.manifestGenerated.getTime());
    this.applicationName = init.applicationName;
    this.applicationVersions = Object.freeze(init.applicationVersions.map(freezeAppVersion));
    Object.freeze(this);
  }

  get manifestGeneratedIso(): string {
    return this.manifestGenerated.toISOString();
  }

  applicationVersionsForMajor(major: number): AppVersion[] {
    return this.applicationVersions
      .filter((appVersion) => majorVersionOf(appVersion.version) === major)
      .sort((a, b) => versionComparator(a.version, b.version));
  }

  uniqueExtensionNames(forMajor?: number): string[] {
    const byKey = new Map<string, string>();
    for (const appVersion of this.scopedAppVersions(forMajor)) {
      for (const extension of appVersion.extensions) {
        const key = extension.name.toLowerCase();
        if (!byKey.has(key)) {
          byKey.set(key, extension.name);
        }
      }
    }

    return Array.from(byKey.values()).sort(compareNamesInsensitive);
  }

  findExtension(name: string): ExtensionEntry[] {
    const key = name.toLowerCase();
    return this.applicationVersions.flatMap((appVersion) =>
      appVersion.extensions.filter((extension) => extension.name.toLowerCase() === key)
    );
  }

  /**
   * Highest version of the named extension across every app version (or only
   * those of `majorAppVersion`). Versions without metadata or without a
   * metadata version never win. When two versions normalize to the same key
   * the one listed last wins.
   */
  highestVersionForExtension(
    name: string,
    majorAppVersion?: number,
    options?: ManifestQueryOptions
  ): ExtensionVersion | null {
    const key = name.toLowerCase();
    const allowSnapshots = options?.allowSnapshots ?? true;
    const candidates: QualifiedExtensionVersion[] = [];

    for (const appVersion of this.scopedAppVersions(majorAppVersion)) {
      for (const extension of appVersion.extensions) {
        if (extension.name.toLowerCase() !== key) {
          continue;
        }

        for (const version of extension.versions) {
          if (!isQualified(version)) {
            continue;
          }
          if (!allowSnapshots && isSnapshotVersion(version.extInfo.version)) {
            continue;
          }
          candidates.push(version);
        }
      }
    }

    candidates.sort((a, b) => compareVersions(a.extInfo.version, b.extInfo.version));
    return candidates.at(-1) ?? null;
  }

  highestExtensionVersionsForMajor(major: number, options?: ManifestQueryOptions): ExtensionVersion[] {
    const result: ExtensionVersion[] = [];
    for (const name of this.uniqueExtensionNames(major)) {
      const highest = this.highestVersionForExtension(name, major, options);
      if (highest) {
        result.push(highest);
      }
    }

    return result;
  }

  latestApplicationVersion(): AppVersion | null {
    const sorted = [...this.applicationVersions].sort((a, b) => versionComparator(a.version, b.version));
    return sorted.at(-1) ?? null;
  }

  toDocument(): ManifestDocument {
    return {
      manifestGenerated: this.manifestGeneratedIso,
      applicationName: this.applicationName,
      applicationVersions: this.applicationVersions.map((appVersion) => ({
        version: appVersion.version,
        extensions: appVersion.extensions.map((extension) => ({
          name: extension.name,
          versions: extension.versions.map((version) => ({
            extInfo: version.extInfo ? { ...version.extInfo, customFields: { ...version.extInfo.customFields } } : null,
            downloadPath: version.downloadPath,
            signaturePath: version.signaturePath,
            screenshots: [...version.screenshots]
          }))
        }))
      }))
    };
  }

  private scopedAppVersions(major: number | undefined): readonly AppVersion[] {
    return typeof major === 'number' ? this.applicationVersionsForMajor(major) : this.applicationVersions;
  }
}

export function serializeManifest(manifest: VersionManifest): string {
  return JSON.stringify(manifest.toDocument(), null, 2);
}

function isQualified(version: ExtensionVersion): version is QualifiedExtensionVersion {
  return version.extInfo !== null && typeof version.extInfo.version === 'string';
}

function compareNamesInsensitive(a: string, b: string): number {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  if (left === right) {
    return 0;
  }
  return left < right ? -1 : 1;
}

function freezeAppVersion(appVersion: AppVersion): AppVersion {
  return Object.freeze({
    version: appVersion.version,
    extensions: Object.freeze(
      appVersion.extensions.map((extension) =>
        Object.freeze({
          name: extension.name,
          versions: Object.freeze(extension.versions.map(freezeExtensionVersion))
        })
      )
    )
  });
}

function freezeExtensionVersion(version: ExtensionVersion): ExtensionVersion {
  return Object.freeze({
    extInfo: version.extInfo
      ? Object.freeze({ ...version.extInfo, customFields: Object.freeze({ ...version.extInfo.customFields }) })
      : null,
    downloadPath: version.downloadPath,
    signaturePath: version.signaturePath,
    screenshots: Object.freeze([...version.screenshots])
  });
}
