export interface ReleaseVersion {
  major: number;
  minor: number;
  patch: number;
}

export type ReleaseDecision =
  | { trigger: true; tag: string; version: ReleaseVersion }
  | { trigger: false; reason: string };
