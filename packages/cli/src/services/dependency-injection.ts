import * as path from 'path';
import { Config, OperationLog, Transfer } from '@k7/core';
import type { AccountStore, RunLogStore } from '@k7/core';
import { FsAccountStore, FsConfigStore, FsRunLogStore, createConfigManager } from '@k7/core/fs';

/**
 * Dependency Injection Service for the K7 CLI
 *
 * Creates and caches the core collaborators for the current project:
 * K7_HOME when set, else the nearest directory holding `.k7`, else the
 * working directory.
 */
export class DependencyInjectionService {
  private static instance: DependencyInjectionService | null = null;
  private projectRoot: string | null = null;
  private configManager: Config.ConfigManager | null = null;
  private accountStore: AccountStore.AccountStore | null = null;
  private runLogStore: RunLogStore.RunLogStore | null = null;
  private operationLog: OperationLog.OperationLog | null = null;
  private transferModule: Transfer.TransferModule | null = null;

  private constructor() { }

  /**
   * Singleton pattern to ensure single instance across CLI
   */
  static getInstance(): DependencyInjectionService {
    if (!DependencyInjectionService.instance) {
      DependencyInjectionService.instance = new DependencyInjectionService();
    }
    return DependencyInjectionService.instance;
  }

  /**
   * Drops the cached instance (tests switch projects through K7_HOME).
   */
  static resetInstance(): void {
    DependencyInjectionService.instance = null;
  }

  getProjectRoot(): string {
    if (!this.projectRoot) {
      this.projectRoot = FsConfigStore.resolveProjectRoot(process.env);
    }
    return this.projectRoot;
  }

  getConfigManager(): Config.ConfigManager {
    if (!this.configManager) {
      this.configManager = createConfigManager(this.getProjectRoot(), process.env);
    }
    return this.configManager;
  }

  async getAccountStore(): Promise<AccountStore.AccountStore> {
    if (!this.accountStore) {
      const config = this.getConfigManager();
      const accountsDir = path.resolve(this.getProjectRoot(), await config.getAccountsDir());
      this.accountStore = new FsAccountStore(accountsDir, {
        roleMetadataKey: await config.getRoleMetadataKey(),
      });
    }
    return this.accountStore;
  }

  getRunLogStore(): RunLogStore.RunLogStore {
    if (!this.runLogStore) {
      this.runLogStore = new FsRunLogStore(this.getProjectRoot());
    }
    return this.runLogStore;
  }

  async getOperationLog(): Promise<OperationLog.OperationLog> {
    if (!this.operationLog) {
      // No console mirror: commands render the run log themselves and
      // --json output must stay a single document on stdout.
      this.operationLog = new OperationLog.OperationLog({
        store: this.getRunLogStore(),
        ttlSeconds: await this.getConfigManager().getLogRetentionSeconds(),
      });
    }
    return this.operationLog;
  }

  async getTransferModule(): Promise<Transfer.TransferModule> {
    if (!this.transferModule) {
      const config = this.getConfigManager();
      this.transferModule = new Transfer.TransferModule({
        store: await this.getAccountStore(),
        log: await this.getOperationLog(),
        roleMetadataKey: await config.getRoleMetadataKey(),
        maxArchiveBytes: await config.getMaxArchiveBytes(),
      });
    }
    return this.transferModule;
  }
}
