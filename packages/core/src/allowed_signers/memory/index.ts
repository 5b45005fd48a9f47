export { MemoryAllowedSignersStore } from './memory_allowed_signers_store';
