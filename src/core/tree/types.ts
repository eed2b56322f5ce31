/**
 * Source tree types shared by the scanner, the plan adapter and the validator.
 */

export interface SourceFile {
  /** Project-relative posix path */
  path: string;
  /** File content; absent for virtual (planned) files */
  content?: string;
  /** Project-relative paths of imported files inside the tree */
  imports: string[];
  /** 1-based line of the first import of each target, when known */
  importLines?: Map<string, number>;
}

export interface SourceTree {
  /** Files sorted by path */
  files: SourceFile[];
}

/**
 * An import specifier as written in a source file.
 */
export interface ImportSpecifier {
  specifier: string;
  line: number;
}
