export interface BundleFile {
  /** Absolute path; sections are ordered by it */
  path: string;
  content: string;
  /** Diff against the comparison branch; empty or absent when identical */
  diff?: string;
}

export interface AssembleInput {
  files: BundleFile[];
  /** The instruction line, appended verbatim as the final section */
  instruction: string;
  /** Comparison branch; diff sections are emitted only when set */
  diffBranch?: string;
}

export interface RegionMarkers {
  start: string;
  end: string;
  placeholder: string;
}

export interface AssembleOptions {
  regions: RegionMarkers;
  sizeWarningThreshold: number;
}

export interface ContentBundle {
  text: string;
  /** Character count of `text` */
  size: number;
  /** Paths in the order they appear */
  files: string[];
  /** Set when `size` exceeds the threshold; the bundle is still usable */
  warning?: string;
}
