import { createWriteStream } from 'fs';
import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import archiver from 'archiver';
import pino from 'pino';
import { exportTimestamp } from '../export/csv-export.js';

const log = pino({ name: 'listing-files' });

export interface ListingPhoto {
  /** Original upload name; only its extension is kept */
  name: string;
  content: Buffer;
}

export interface ListingPackageInput {
  title: string;
  facebook: string;
  craigslist: string;
  offerup: string;
  photos?: readonly ListingPhoto[];
}

export interface SavedListingPackage {
  folder: string;
  files: string[];
  /** Null when the archive could not be written; the folder is still usable */
  zipPath: string | null;
}

interface PackageEntry {
  filePath: string;
  /** Path inside the archive */
  entryName: string;
}

/** Letters, digits, spaces, dashes and underscores; "listing" when nothing is left. */
export function safeListingName(title: string): string {
  const kept = Array.from(title)
    .filter((c) => /[\p{L}\p{N} _-]/u.test(c))
    .join('')
    .trim();
  return kept || 'listing';
}

export function listingBaseName(title: string, now: Date): string {
  return `${safeListingName(title)}_${exportTimestamp(now)}`.replace(/ /g, '_');
}

function photoFileName(photo: ListingPhoto, index: number): string {
  const ext = path.extname(photo.name).toLowerCase() || '.jpg';
  return `img_${String(index + 1).padStart(2, '0')}${ext}`;
}

function zipEntries(entries: readonly PackageEntry[], zipPath: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const output = createWriteStream(zipPath);
    const archive = archiver('zip', { zlib: { level: 9 } });

    output.on('close', () => resolve());
    output.on('error', reject);
    archive.on('error', reject);

    archive.pipe(output);
    for (const { filePath, entryName } of entries) {
      archive.file(filePath, { name: entryName });
    }
    archive.finalize().catch(reject);
  });
}

/**
 * Write one text file per platform (plus numbered photos) into
 * `<dir>/<title>_<timestamp>/`, then zip the same files next to the folder.
 */
export async function saveListingPackage(
  input: ListingPackageInput,
  dir: string,
  now: Date = new Date(),
): Promise<SavedListingPackage> {
  const baseName = listingBaseName(input.title, now);
  const folder = path.join(dir, baseName);
  await mkdir(folder, { recursive: true });

  const entries: PackageEntry[] = [];
  const texts: [string, string][] = [
    ['facebook.txt', input.facebook],
    ['craigslist.txt', input.craigslist],
    ['offerup.txt', input.offerup],
  ];
  for (const [name, text] of texts) {
    const filePath = path.join(folder, name);
    await writeFile(filePath, text, 'utf8');
    entries.push({ filePath, entryName: name });
  }

  const photos = input.photos ?? [];
  if (photos.length > 0) {
    const photosDir = path.join(folder, 'photos');
    await mkdir(photosDir, { recursive: true });
    for (const [index, photo] of photos.entries()) {
      const name = photoFileName(photo, index);
      const filePath = path.join(photosDir, name);
      await writeFile(filePath, photo.content);
      entries.push({ filePath, entryName: `photos/${name}` });
    }
  }

  let zipPath: string | null = path.join(dir, `${baseName}.zip`);
  try {
    await zipEntries(entries, zipPath);
  } catch (err) {
    log.warn({ err, folder }, 'Listing archive failed, folder kept without zip');
    zipPath = null;
  }

  log.info({ folder, files: entries.length, zipPath }, 'Listing package saved');
  return { folder, files: entries.map((e) => e.filePath), zipPath };
}
