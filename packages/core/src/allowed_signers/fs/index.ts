export { FsAllowedSignersStore } from './fs_allowed_signers_store';
