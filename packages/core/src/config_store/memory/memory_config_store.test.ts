import { MemoryConfigStore } from './memory_config_store';

describe('MemoryConfigStore', () => {
  it('should return null until a config is set', async () => {
    expect(await new MemoryConfigStore().loadConfig()).toBeNull();
  });

  it('should return the config saved via saveConfig', async () => {
    const store = new MemoryConfigStore();
    await store.saveConfig({ roleMetadataKey: 'roles' });

    expect(await store.loadConfig()).toEqual({ roleMetadataKey: 'roles' });
    expect(store.getConfig()).toEqual({ roleMetadataKey: 'roles' });
  });

  it('should reset to null on clear', async () => {
    const store = new MemoryConfigStore();
    store.setConfig({ maxArchiveBytes: 10 });
    store.clear();

    expect(await store.loadConfig()).toBeNull();
  });
});
