import { writeFile } from 'node:fs/promises'

/**
 * Write updated manifest content back to disk.
 *
 * @param path - Manifest path.
 * @param content - New file content.
 */
export async function writeManifest(
  path: string,
  content: string,
): Promise<void> {
  await writeFile(path, content, 'utf8')
}
