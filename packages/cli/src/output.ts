/**
 * @module output
 * Output file naming.
 */

import * as path from 'path';

/** Files written for one render. */
export interface OutputPaths {
  tiff: string;
  png: string;
}

/**
 * Work out where to write.
 *
 * Without an explicit output, the base name is the descriptor's `name`
 * with spaces replaced by underscores, or else the descriptor file name
 * without `.json`; either way the files go beside the descriptor.
 *
 * @param descriptorFile - Path of the descriptor.
 * @param name - Descriptor `name`, if any.
 * @param output - Explicit TIFF path, if any.
 */
export function outputPaths(descriptorFile: string, name?: string, output?: string): OutputPaths {
  if (output) {
    const ext = path.extname(output);
    const base = /^\.tiff?$/i.test(ext) ? output.slice(0, -ext.length) : output;
    return { tiff: output, png: `${base}.png` };
  }
  const dir = path.dirname(descriptorFile);
  const base = name ? name.replace(/ /g, '_') : path.basename(descriptorFile).replace(/\.json$/i, '');
  const stem = path.join(dir, base);
  return { tiff: `${stem}.tif`, png: `${stem}.png` };
}
