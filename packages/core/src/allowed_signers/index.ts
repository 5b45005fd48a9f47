/**
 * Allowed signers: parsing, formatting and authorization of SSH signing keys
 *
 * @module allowed_signers
 */

export {
  AllowedSignersParseError,
  parseAllowedSigners,
  formatAllowedSigners,
  formatAllowedSignerEntry,
  findPrincipalsForKey,
  upsertSigner,
} from './allowed_signers';
export type { AllowedSignerEntry, IAllowedSignersStore, UpsertSignerResult } from './allowed_signers';
