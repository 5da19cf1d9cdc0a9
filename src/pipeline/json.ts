import fs from 'fs-extra';

let tmpCounter = 0;

/** Write through a sibling temp file and rename, so readers never see a partial file. */
export async function writeJsonAtomic(filePath: string, data: unknown): Promise<void> {
    const tmp = `${filePath}.${process.pid}.${tmpCounter++}.tmp`;
    await fs.outputJson(tmp, data, { spaces: 2 });
    await fs.move(tmp, filePath, { overwrite: true });
}
