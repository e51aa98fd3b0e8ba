import { register, type HandlerRegistration } from './types';
import { DocSchema } from './schemas/docSchemas';
import { RootSchema } from './schemas/rootSchemas';
import { handleDoc } from './handlers/docHandlers';
import { handleRoot } from './handlers/rootHandlers';

/**
 * Registry of all CLI command handlers, keyed by the name passed to
 * `executeHandler`.
 */
export const cliHandlers: Record<string, HandlerRegistration> = {
  doc: register(DocSchema, (input) => handleDoc(input)),
  root: register(RootSchema, () => handleRoot()),
};
