export { FsConfigStore, createConfigManager, DEFAULT_CONFIG_PATH } from './fs_config_store';
