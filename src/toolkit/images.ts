import path from "node:path";

import fg from "fast-glob";
import fse from "fs-extra";

import { imageExtension } from "../core/subjects.js";

const IMAGE_GLOBS = ["*.nii", "*.nii.gz", "*.hdr", "*.hdr.gz"];

// Analyze pairs keep their voxel data in a sibling file with the same stem.
const COMPANION_EXTENSIONS: Record<string, string> = {
  ".hdr": ".img",
  ".hdr.gz": ".img.gz",
};

/**
 * Copies an image to `<destDir>/<stem><ext>`, keeping the source extension and bringing the
 * companion data file along for header/image pairs. Returns the destination image path.
 */
export async function copyImage(source: string, destDir: string, stem: string): Promise<string> {
  const ext = imageExtension(source);
  const dest = path.join(destDir, `${stem}${ext}`);
  await fse.copy(source, dest, { overwrite: true, errorOnExist: false });

  const companionExt = COMPANION_EXTENSIONS[ext];
  if (companionExt) {
    const companion = `${source.slice(0, -ext.length)}${companionExt}`;
    if (await fse.pathExists(companion)) {
      await fse.copy(companion, path.join(destDir, `${stem}${companionExt}`), { overwrite: true });
    }
  }
  return dest;
}

/** Image headers directly inside `dir`, sorted by name. */
export async function listImages(dir: string): Promise<string[]> {
  if (!(await fse.pathExists(dir))) return [];
  const found = await fg(IMAGE_GLOBS, { cwd: dir, onlyFiles: true });
  return found.sort().map((name) => path.join(dir, name));
}
