import { createReadStream, createWriteStream } from "node:fs";
import { pipeline } from "node:stream/promises";
import { createGzip } from "node:zlib";
import archiver from "archiver";

/** Target is created exclusively; an existing file makes this fail. */
export async function gzipFile(source: string, target: string): Promise<void> {
  await pipeline(
    createReadStream(source),
    createGzip({ level: 9 }),
    createWriteStream(target, { flags: "wx" }),
  );
}

export async function zipFile(
  source: string,
  target: string,
  entryName: string,
): Promise<void> {
  const output = createWriteStream(target, { flags: "wx" });
  const archive = archiver("zip", { zlib: { level: 9 } });
  const written = pipeline(archive, output);
  archive.file(source, { name: entryName });
  await Promise.all([archive.finalize(), written]);
}
