export interface Credential {
  username: string;
  password: string;
}

export interface Session {
  token: string;
  baseUrl: string;
}

export interface ImageRecord {
  candidate: string;
  visit: string;
  scanType: string;
  /** Relative to the API base, e.g. `/candidates/300001/V1/images/scan.mnc`. */
  link: string;
}

export type Modality = "anat" | "fmap" | "dwi" | "misc";

export type CanonicalEntry = Readonly<{
  project: string;
  candidate: string;
  visit: string;
  filename: string;
  modality: Modality;
  destinationPath: string;
  url: string;
}>;

export interface ManifestRecord {
  project: string;
  candidate: string;
  visit: string;
  filename: string;
  modality: string;
  target_path: string;
  url: string;
}

export interface IngestSummary {
  projects: number;
  registered: number;
  skipped: number;
  materialized: number;
}
