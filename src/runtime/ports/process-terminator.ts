/**
 * Port for terminating the current process.
 * Only the composition root may call this; a successful run ends on its own.
 */
export type ExitCode = { readonly kind: 'failure' };

export interface ProcessTerminator {
  terminate(code: ExitCode): never;
}
