import type { BindingDescriptor } from '../contract/descriptor.js';

/** One call: a descriptor plus concrete arguments. Discarded after it runs. */
export type Invocation = {
  readonly descriptor: BindingDescriptor;
  readonly args: readonly unknown[];
};

export type NamingOptions = {
  /** Prefix of generated argument variables */
  argumentPrefix: string;
  /** Prefix of generated return variables */
  returnPrefix: string;
};

export const DEFAULT_NAMING: Readonly<NamingOptions> = Object.freeze({
  argumentPrefix: 'args_',
  returnPrefix: 'return_',
});
