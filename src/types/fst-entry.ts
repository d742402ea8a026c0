/**
 * One 12-byte record of the file system table.
 */
export type FstEntry =
  | {
      readonly kind: 'directory';
      readonly nameOffset: number;
      readonly parentIndex: number;
      /** Table index one past the last entry of this directory's subtree. */
      readonly endIndex: number;
    }
  | {
      readonly kind: 'file';
      readonly nameOffset: number;
      readonly offset: number;
      readonly size: number;
    };
