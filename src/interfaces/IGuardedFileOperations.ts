/**
 * Guarded file operations interface - the file side of the collaborator
 * contract
 */

import { IFileAccessGuard } from "./IFileAccessGuard";

export interface EditResult {
  path: string;
  /** Number of occurrences replaced */
  replacements: number;
}

export interface IGuardedFileOperations {
  /** Current guard. A disabled guard until a working directory is set. */
  readonly guard: IFileAccessGuard;

  /**
   * Replace the guard with one rooted at workingDir
   */
  setWorkingDirectory(workingDir: string, enabled?: boolean): void;

  /**
   * @throws SecurityError when the guard denies the path
   */
  readFile(filePath: string): string;

  /**
   * @throws SecurityError when the guard denies the path
   */
  writeFile(filePath: string, content: string): void;

  /**
   * Replace every occurrence of originalText with replacementText.
   * @throws SecurityError when the guard denies the path
   * @throws ValidationError when originalText is not in the file
   */
  editFile(
    filePath: string,
    originalText: string,
    replacementText: string
  ): EditResult;
}
