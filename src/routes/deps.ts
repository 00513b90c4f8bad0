import type { Env } from '../config/env.js';
import type { CodeStore } from '../db/code-store.js';
import type { UserRepository } from '../db/user-repository.js';
import type { EmailProvider } from '../services/email.service.js';
import type { SocialProviderRegistry } from '../services/social/index.js';

/**
 * Collaborators the routes hand to services. Anything left out falls back to the
 * process-wide default (Postgres, Redis or memory, configured mail provider).
 */
export type RouteDeps = {
  env?: Env;
  now?: () => Date;
  users?: UserRepository;
  codes?: CodeStore;
  emailProvider?: EmailProvider;
  providers?: SocialProviderRegistry;
};
