import { posix } from "node:path";
import { joinApiUrl } from "./api.js";
import { UnsafePathError } from "./errors.js";
import type { CanonicalEntry, ImageRecord, Modality } from "./types.js";

export const IMAGE_EXTENSION = ".mnc";

interface ScanRule {
  prefix: string;
  modality: Modality;
  suffix: string;
}

const SCAN_RULES: readonly ScanRule[] = [
  { prefix: "t1", modality: "anat", suffix: "T1w" },
  { prefix: "t2", modality: "anat", suffix: "T2w" },
  { prefix: "fieldmap", modality: "fmap", suffix: "epi" },
  { prefix: "dwi", modality: "dwi", suffix: "dwi" },
];

export function classifyScanType(scanType: string): { modality: Modality; suffix: string } {
  const scan = scanType.toLowerCase();
  const rule = SCAN_RULES.find((candidate) => scan.startsWith(candidate.prefix));
  if (rule) {
    return { modality: rule.modality, suffix: rule.suffix };
  }
  return { modality: "misc", suffix: scan };
}

function assertSegment(segment: string, field: string, project: string, record: ImageRecord): void {
  if (!segment || segment === "." || segment === ".." || /[\\/]/.test(segment)) {
    throw new UnsafePathError(`Refusing ${field} "${segment}" as a path segment`, {
      project,
      candidate: record.candidate,
      visit: record.visit,
      scanType: record.scanType,
    });
  }
}

/**
 * Maps one API image record onto its BIDS-style location inside the dataset:
 * `<project>/sub-<candidate>/ses-<visit>/<modality>/sub-<candidate>_ses-<visit>_<suffix>.mnc`.
 *
 * Pure and order-independent. Values that would escape their directory (`..`, `/`, `\`)
 * raise UnsafePathError. The returned `destinationPath` is the manifest dedup key.
 */
export function resolveCanonicalEntry(project: string, record: ImageRecord, apiBase: string): CanonicalEntry {
  const { modality, suffix } = classifyScanType(record.scanType);
  const subject = `sub-${record.candidate}`;
  const session = `ses-${record.visit}`;
  const filename = `${subject}_${session}_${suffix}${IMAGE_EXTENSION}`;
  assertSegment(project, "project", project, record);
  assertSegment(subject, "candidate", project, record);
  assertSegment(session, "visit", project, record);
  assertSegment(filename, "scan type", project, record);
  return {
    project,
    candidate: record.candidate,
    visit: record.visit,
    filename,
    modality,
    destinationPath: posix.join(project, subject, session, modality, filename),
    url: joinApiUrl(apiBase, record.link),
  };
}
