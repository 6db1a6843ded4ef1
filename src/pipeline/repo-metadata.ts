import { simpleGit } from "simple-git";
import type { EvidenceMetadata } from "../evidence/types.js";

/**
 * Provenance for evidence collected from a local repository. Directories
 * that are not git work trees, or have no commits yet, only get `repo`.
 */
export async function describeRepository(
  repoPath: string,
): Promise<EvidenceMetadata> {
  const git = simpleGit({ baseDir: repoPath });
  if (!(await git.checkIsRepo())) {
    return { repo: repoPath };
  }

  const anyCommit = (await git.raw(["rev-list", "-n", "1", "--all"])).trim();
  if (!anyCommit) {
    return { repo: repoPath };
  }
  const commit = (await git.revparse(["HEAD"])).trim();
  const branch = (await git.revparse(["--abbrev-ref", "HEAD"])).trim();
  return { repo: repoPath, commit, branch };
}
