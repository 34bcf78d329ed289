import path from 'path';
import { FileManager } from '../utils/FileManager';
import { instanceLayout } from '../download/core/InstallOrchestrator';

/**
 * Build the runtime classpath: every file under libraries/ followed by the
 * client artifact, as absolute normalized paths joined by the delimiter
 */
export async function buildClasspath(
  instanceDir: string,
  files: FileManager = new FileManager(),
  delimiter: string = path.delimiter,
): Promise<string> {
  const layout = instanceLayout(instanceDir);
  const libraries = await files.listFiles(layout.librariesDir);

  return [...libraries, layout.clientJar]
    .map((entry) => path.resolve(entry))
    .join(delimiter);
}
