import crypto from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';

/**
 * Write a file via temp file + fsync + rename so readers never observe a
 * partially written document.
 */
export function atomicWriteFileSync(filePath: string, content: string | Buffer): void {
  const dir = path.dirname(filePath);
  const tmp = `${filePath}.tmp.${crypto.randomBytes(4).toString('hex')}`;

  fs.mkdirSync(dir, { recursive: true });
  try {
    const fd = fs.openSync(tmp, 'w', 0o644);
    try {
      fs.writeFileSync(fd, content);
      fs.fdatasyncSync(fd);
    } finally {
      fs.closeSync(fd);
    }
    fs.renameSync(tmp, filePath);
  } catch (err) {
    fs.rmSync(tmp, { force: true });
    throw err;
  }
}

export function atomicWriteJsonSync(filePath: string, data: unknown): void {
  atomicWriteFileSync(filePath, `${JSON.stringify(data, null, 2)}\n`);
}
