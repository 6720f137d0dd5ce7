/**
 * Whether process-level signal handlers may be installed.
 */
export type ProcessLifecyclePolicy =
  | { readonly kind: 'install_signal_handlers' }
  | { readonly kind: 'no_signal_handlers' };
