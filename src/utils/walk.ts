import fs from "fs";
import path from "path";
import fg from "fast-glob";

export interface WalkEntry {
  dirPath: string;
  subdirs: string[];
  files: string[];
}

export interface WalkOptions {
  ignore?: string[];
}

interface DirListing {
  subdirs: string[];
  files: string[];
}

function isDirectoryLink(absolutePath: string): boolean {
  try {
    return fs.statSync(absolutePath).isDirectory();
  } catch {
    return false;
  }
}

function listingFor(listings: Map<string, DirListing>, relDir: string): DirListing {
  let listing = listings.get(relDir);
  if (!listing) {
    listing = { subdirs: [], files: [] };
    listings.set(relDir, listing);
  }
  return listing;
}

function collectListings(root: string, options: WalkOptions): Map<string, DirListing> {
  const entries = fg.sync(["**"], {
    cwd: root,
    dot: true,
    onlyFiles: false,
    followSymbolicLinks: false,
    objectMode: true,
    ignore: options.ignore ?? [],
  });

  // Keyed by posix path relative to root; "" is the root itself.
  const listings = new Map<string, DirListing>();
  listingFor(listings, "");

  for (const entry of entries) {
    const parentRel = path.posix.dirname(entry.path);
    const parent = listingFor(listings, parentRel === "." ? "" : parentRel);

    if (entry.dirent.isDirectory()) {
      parent.subdirs.push(entry.name);
      listingFor(listings, entry.path);
    } else if (entry.dirent.isSymbolicLink() && isDirectoryLink(path.join(root, entry.path))) {
      parent.subdirs.push(entry.name);
    } else {
      parent.files.push(entry.name);
    }
  }

  for (const listing of listings.values()) {
    listing.subdirs.sort();
    listing.files.sort();
  }
  return listings;
}

function* visit(root: string, relDir: string, listings: Map<string, DirListing>): Generator<WalkEntry> {
  const listing = listingFor(listings, relDir);
  const dirPath = relDir ? path.join(root, ...relDir.split("/")) : root;
  yield { dirPath, subdirs: [...listing.subdirs], files: [...listing.files] };

  for (const name of listing.subdirs) {
    const childRel = relDir ? `${relDir}/${name}` : name;
    // Linked directories are listed but never entered.
    if (listings.has(childRel)) {
      yield* visit(root, childRel, listings);
    }
  }
}

/**
 * Depth-first, pre-order walk of a local directory: every directory is
 * yielded before anything beneath it, with names sorted inside each level.
 */
export function* walkLocalTree(root: string, options: WalkOptions = {}): Generator<WalkEntry> {
  if (!fs.existsSync(root) || !fs.statSync(root).isDirectory()) {
    throw new Error(`Local directory not found: ${root}`);
  }
  yield* visit(root, "", collectListings(root, options));
}
