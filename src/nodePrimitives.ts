/**
 * Errno-flavoured error raised by the Node.js filesystem APIs. Only the
 * properties inspected in the codebase are declared.
 */
export interface ErrnoException extends Error {
  code?: string;
  errno?: number;
  path?: string;
  syscall?: string;
}
