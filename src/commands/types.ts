import type { CommandModule } from 'yargs';

/**
 * Every command file default-exports one of these.
 */
export type Command<T = object> = CommandModule<object, T>;
