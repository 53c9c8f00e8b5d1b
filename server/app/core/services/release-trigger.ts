import { ReleaseDecision, ReleaseVersion } from "../entities";

const TAG_PATTERN = /^v(0|[1-9]\d*)\.(0|[1-9]\d*)\.(0|[1-9]\d*)$/;
const TAG_REF_PREFIX = "refs/tags/";

export function parseReleaseTag(tag: string): ReleaseVersion | null {
  const name = tag.startsWith(TAG_REF_PREFIX) ? tag.slice(TAG_REF_PREFIX.length) : tag;
  const match = TAG_PATTERN.exec(name);
  if (!match) {
    return null;
  }
  return {
    major: Number(match[1]),
    minor: Number(match[2]),
    patch: Number(match[3])
  };
}

export function formatVersion(version: ReleaseVersion): string {
  return `${version.major}.${version.minor}.${version.patch}`;
}

function normalizeBranch(branch: string): string {
  return branch
    .trim()
    .replace(/^\*\s*/, "")
    .replace(/^refs\/heads\//, "")
    .replace(/^refs\/remotes\//, "")
    .replace(/^origin\//, "");
}

export interface ReleaseTriggerInput {
  ref: string;
  /** Branches that contain the tagged commit, e.g. from `git branch -r --contains`. */
  branches: readonly string[];
  mainBranch?: string;
  packageVersion?: string;
}

export function evaluateReleaseTrigger(input: ReleaseTriggerInput): ReleaseDecision {
  const mainBranch = input.mainBranch ?? "main";
  const ref = input.ref.trim();

  if (ref.startsWith("refs/") && !ref.startsWith(TAG_REF_PREFIX)) {
    return { trigger: false, reason: `${ref} is not a tag` };
  }

  const tag = ref.startsWith(TAG_REF_PREFIX) ? ref.slice(TAG_REF_PREFIX.length) : ref;
  const version = parseReleaseTag(tag);
  if (!version) {
    return { trigger: false, reason: `tag ${tag} does not match vMAJOR.MINOR.PATCH` };
  }

  if (!input.branches.some((branch) => normalizeBranch(branch) === mainBranch)) {
    return { trigger: false, reason: `tag ${tag} is not on ${mainBranch}` };
  }

  if (input.packageVersion !== undefined && input.packageVersion !== formatVersion(version)) {
    return {
      trigger: false,
      reason: `tag ${tag} does not match package version ${input.packageVersion}`
    };
  }

  return { trigger: true, tag, version };
}

/** Reads `<ref> [branch...]` as passed by the release workflow. */
export function verifyReleaseArgs(argv: readonly string[], packageVersion?: string): ReleaseDecision {
  const [ref, ...branches] = argv;
  if (!ref || ref.trim().length === 0) {
    return { trigger: false, reason: "usage: verify-release-tag <ref> [branch...]" };
  }
  return evaluateReleaseTrigger({ ref, branches, packageVersion });
}
