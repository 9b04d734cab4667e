export { FsAccountStore } from './fs_account_store';
