import { BundleInvariantError } from "../errors";

export const BYTES_PER_COMMITMENT = 48;
export const BYTES_PER_PROOF = 48;
export const BYTES_PER_BLOB = 131072;

/**
 * Blob data of a built payload. The three sequences are index-aligned and
 * always equal in length.
 */
export type BlobsBundle = {
  commitments: Uint8Array[];
  proofs: Uint8Array[];
  blobs: Uint8Array[];
};

/** The blob data of a single blob transaction. */
export type BlobSidecar = BlobsBundle;

export type BundleSlice = readonly [commitments: Uint8Array[], proofs: Uint8Array[], blobs: Uint8Array[]];

export const emptyBundle = (): BlobsBundle => ({ commitments: [], proofs: [], blobs: [] });

/** Number of blobs; throws if the sequences disagree. */
export const bundleLength = (b: BlobsBundle): number => {
  const n = b.commitments.length;
  if (b.proofs.length !== n || b.blobs.length !== n)
    throw new BundleInvariantError(
      `bundle sequences differ: ${n} commitments, ${b.proofs.length} proofs, ${b.blobs.length} blobs`,
    );
  return n;
};

/** Concatenates sidecars in order, keeping each sidecar's own order. */
export const bundleFromSidecars = (sidecars: Iterable<BlobSidecar>): BlobsBundle => {
  const bundle = emptyBundle();
  for (const s of sidecars) {
    bundleLength(s);
    bundle.commitments.push(...s.commitments);
    bundle.proofs.push(...s.proofs);
    bundle.blobs.push(...s.blobs);
  }
  return bundle;
};

/**
 * Drains the first `n` entries of each sequence out of `bundle`.
 *
 * Taking more than the bundle holds is a contract violation and throws before
 * anything is removed.
 */
export const take = (bundle: BlobsBundle, n: number): BundleSlice => {
  if (!Number.isInteger(n) || n < 0)
    throw new BundleInvariantError(`cannot take ${n} entries from a bundle`);
  const held = Math.min(bundle.commitments.length, bundle.proofs.length, bundle.blobs.length);
  if (n > held)
    throw new BundleInvariantError(`cannot take ${n} entries from a bundle holding ${held}`);
  return [bundle.commitments.splice(0, n), bundle.proofs.splice(0, n), bundle.blobs.splice(0, n)];
};

export const popSidecar = (bundle: BlobsBundle, n: number): BlobSidecar => {
  const [commitments, proofs, blobs] = take(bundle, n);
  return { commitments, proofs, blobs };
};
