import * as fs from 'fs';
import * as path from 'path';
import { Readable } from 'stream';
import * as tar from 'tar-stream';

function resolveInside(root: string, entryName: string): string {
  const target = path.resolve(root, entryName);
  const relative = path.relative(root, target);
  if (relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new Error(`Archive entry escapes destination: ${entryName}`);
  }
  return target;
}

/**
 * Unpack a tar stream (as returned by the Docker archive API) into destDir.
 * Only regular files and directories are materialised.
 * @returns Paths of the files written
 */
export async function extractArchive(
  archive: NodeJS.ReadableStream,
  destDir: string,
): Promise<string[]> {
  const root = path.resolve(destDir);
  const written: string[] = [];
  const extract = tar.extract();

  extract.on('entry', (header, stream, next) => {
    let target: string;
    try {
      target = resolveInside(root, header.name);
    } catch (err) {
      stream.resume();
      next(err);
      return;
    }

    if (header.type === 'directory') {
      fs.mkdirSync(target, { recursive: true });
      stream.on('end', () => next());
      stream.resume();
      return;
    }

    if (header.type !== 'file') {
      console.warn(`  ! Skipping ${header.type} entry: ${header.name}`);
      stream.on('end', () => next());
      stream.resume();
      return;
    }

    fs.mkdirSync(path.dirname(target), { recursive: true });
    const out = fs.createWriteStream(target, { mode: header.mode });
    out.on('finish', () => {
      written.push(target);
      next();
    });
    out.on('error', next);
    stream.pipe(out);
  });

  await new Promise<void>((resolve, reject) => {
    const fail = (err: unknown) => {
      // Release the source (the Docker API response) as well
      if (archive instanceof Readable) {
        archive.destroy();
      } else {
        archive.resume();
      }
      reject(err);
    };
    archive.on('error', fail);
    extract.on('error', fail);
    extract.on('finish', () => resolve());
    archive.pipe(extract);
  });
  return written;
}

/**
 * Build a tar stream holding hostPath (file or directory tree) under its
 * basename, ready for `putArchive`.
 */
export function packPath(hostPath: string): tar.Pack {
  const pack = tar.pack();

  const addEntry = (current: string, name: string): void => {
    const stat = fs.statSync(current);
    if (stat.isDirectory()) {
      pack.entry({ name, type: 'directory', mode: stat.mode & 0o7777 });
      for (const child of fs.readdirSync(current).sort()) {
        addEntry(path.join(current, child), `${name}/${child}`);
      }
    } else if (stat.isFile()) {
      pack.entry(
        { name, mode: stat.mode & 0o7777, mtime: stat.mtime },
        fs.readFileSync(current),
      );
    }
  };

  addEntry(path.resolve(hostPath), path.basename(hostPath));
  pack.finalize();
  return pack;
}
