import type { VersionRequirement } from "../core/config.js";

import { findModuleBlocks, parseRegistrySource, parseVersionConstraint } from "./module-sources.js";

// =============================================================================
// TYPES
// =============================================================================

export type ModulePin = {
  // Block label: module "<label>" { ... }
  label: string;
  // Module name derived from the source (registry name or VCS repository name).
  name: string;
  source: string;
  // Resolved single version, or null when unpinned or pinned to a range.
  version: string | null;
  constraint: string | null;
};

export type VersionViolation = {
  module: string;
  version: string | null;
  message: string;
};

export interface VersionComparator {
  // Negative when a < b, zero when equal, positive when a > b. Throws on unparseable input.
  compare(a: string, b: string): number;
  isPrerelease(version: string): boolean;
}

export type VersionCheckOptions = {
  allowPrerelease: boolean;
};

// =============================================================================
// SCANNING
// =============================================================================

export function scanModuleVersions(text: string, registryHost = "app.terraform.io"): ModulePin[] {
  const pins: ModulePin[] = [];

  for (const block of findModuleBlocks(text)) {
    if (!block.source) continue;
    const source = block.source.value;
    const constraint = block.version?.value ?? null;

    const registry = parseRegistrySource(source, registryHost);
    if (registry) {
      const parsed = constraint === null ? null : parseVersionConstraint(constraint);
      pins.push({
        label: block.label,
        name: registry.name,
        source,
        version: parsed?.kind === "pinned" ? parsed.version : null,
        constraint,
      });
      continue;
    }

    const vcs = parseVcsSource(source);
    if (vcs) {
      pins.push({ label: block.label, name: vcs.name, source, version: vcs.version, constraint });
    }
  }

  return pins;
}

const VERSION_REF = /^v?\d+(?:\.\d+)*(?:-[0-9A-Za-z.-]+)?$/;
const VERSION_PATTERN = /^v?(\d+(?:\.\d+)*)(?:-([0-9A-Za-z.-]+))?(?:\+[0-9A-Za-z.-]+)?$/;

// git::https://host/org/terraform-aws-vpc//sub?ref=v1.2.3 -> terraform-aws-vpc at 1.2.3
export function parseVcsSource(source: string): { name: string; version: string | null } | null {
  const match = /^git::[^?]*?\/([^/?]+?)(?:\.git)?(?:\/\/[^?]*)?(?:\?(.*))?$/.exec(source);
  if (!match?.[1]) return null;

  const query = new URLSearchParams(match[2] ?? "");
  const ref = query.get("ref");
  if (!ref || !VERSION_REF.test(ref)) {
    return { name: match[1], version: null };
  }
  return { name: match[1], version: ref.replace(/^v/, "") };
}

// =============================================================================
// CHECKING
// =============================================================================

export function checkModuleVersions(
  pins: readonly ModulePin[],
  requirements: Readonly<Record<string, Readonly<VersionRequirement>>>,
  comparator: VersionComparator = DOTTED_VERSION_COMPARATOR,
  options: VersionCheckOptions = { allowPrerelease: true },
): VersionViolation[] {
  const violations: VersionViolation[] = [];

  for (const pin of pins) {
    const requirement = requirements[pin.label] ?? requirements[pin.name];
    if (!requirement) continue;

    const { min, max } = requirement;
    if (pin.version === null) {
      if (min) {
        const pinned = pin.constraint ? `is constrained to "${pin.constraint}"` : "has no version";
        violations.push({
          module: pin.label,
          version: null,
          message: `module "${pin.label}" ${pinned} but requires at least ${min}`,
        });
      }
      continue;
    }

    try {
      if (!options.allowPrerelease && comparator.isPrerelease(pin.version)) {
        violations.push({
          module: pin.label,
          version: pin.version,
          message: `module "${pin.label}" uses pre-release version ${pin.version}`,
        });
        continue;
      }
      if (min && comparator.compare(pin.version, min) < 0) {
        violations.push({
          module: pin.label,
          version: pin.version,
          message: `module "${pin.label}" version ${pin.version} is below minimum required ${min}`,
        });
      }
      if (max && comparator.compare(pin.version, max) > 0) {
        violations.push({
          module: pin.label,
          version: pin.version,
          message: `module "${pin.label}" version ${pin.version} exceeds maximum allowed ${max}`,
        });
      }
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      violations.push({
        module: pin.label,
        version: pin.version,
        message: `module "${pin.label}" has an invalid version: ${detail}`,
      });
    }
  }

  return violations;
}

// =============================================================================
// DEFAULT COMPARATOR
// =============================================================================

type ParsedVersion = {
  release: number[];
  prerelease: string[];
};

function parseVersion(version: string): ParsedVersion {
  const match = VERSION_PATTERN.exec(version.trim());
  if (!match?.[1]) {
    throw new Error(`Invalid version format: ${version}`);
  }
  return {
    release: match[1].split(".").map((part) => Number.parseInt(part, 10)),
    prerelease: match[2] ? match[2].split(".") : [],
  };
}

function compareIdentifiers(a: string, b: string): number {
  const aNumeric = /^\d+$/.test(a);
  const bNumeric = /^\d+$/.test(b);
  if (aNumeric && bNumeric) return Number.parseInt(a, 10) - Number.parseInt(b, 10);
  if (aNumeric) return -1;
  if (bNumeric) return 1;
  return a < b ? -1 : a > b ? 1 : 0;
}

// Dotted numeric release (missing parts count as 0), then semver pre-release precedence.
export const DOTTED_VERSION_COMPARATOR: VersionComparator = {
  compare(a: string, b: string): number {
    const left = parseVersion(a);
    const right = parseVersion(b);

    const length = Math.max(left.release.length, right.release.length);
    for (let i = 0; i < length; i += 1) {
      const diff = (left.release[i] ?? 0) - (right.release[i] ?? 0);
      if (diff !== 0) return Math.sign(diff);
    }

    // A release outranks any of its pre-releases.
    if (left.prerelease.length === 0 && right.prerelease.length === 0) return 0;
    if (left.prerelease.length === 0) return 1;
    if (right.prerelease.length === 0) return -1;

    const prereleaseLength = Math.max(left.prerelease.length, right.prerelease.length);
    for (let i = 0; i < prereleaseLength; i += 1) {
      const l = left.prerelease[i];
      const r = right.prerelease[i];
      if (l === undefined) return -1;
      if (r === undefined) return 1;
      const diff = compareIdentifiers(l, r);
      if (diff !== 0) return Math.sign(diff);
    }
    return 0;
  },

  isPrerelease(version: string): boolean {
    return parseVersion(version).prerelease.length > 0;
  },
};
