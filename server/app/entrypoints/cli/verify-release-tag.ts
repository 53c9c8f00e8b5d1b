import path from "node:path";
import { verifyReleaseArgs } from "../../core/services/release-trigger";
import { readPackageVersion } from "../../infrastructure/package-version";

// Usage: verify-release-tag <ref> [branch...]
// Branches are the ones that contain the tagged commit.
const packageVersion = readPackageVersion(path.resolve(process.cwd(), "package.json"));
const decision = verifyReleaseArgs(process.argv.slice(2), packageVersion);

if (decision.trigger) {
  console.log(`Release ${decision.tag} approved`);
  process.exit(0);
}
console.error(`Release skipped: ${decision.reason}`);
process.exit(1);
