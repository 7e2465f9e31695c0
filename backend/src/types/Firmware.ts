export interface FirmwareInfo {
  version: string;
  coreVersion: string;
  sdkVersion: string;
  isMinimal: boolean;
}

export interface ReleaseInfo {
  version: string;
  releaseDate: string;
  releaseNotes: string;
  downloadUrl: string | null;
  releaseUrl: string;
}

export type ReleaseLookup =
  | { ok: true; release: ReleaseInfo }
  | { ok: false; error: string };

export type VersionComparison = 'older' | 'same' | 'newer' | 'incomparable';
