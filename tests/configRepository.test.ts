import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { test } from './testHarness';
import { StorageAdapter } from '../src/adapters/storage/StorageAdapter';
import { ConfigAdapter } from '../src/adapters/config/ConfigAdapter';
import { ConfigRepository } from '../src/application/config/configRepository';
import { ConfigValidationError, parseServerConfig, slugify } from '../src/domain/config/schema';
import { loadEnvironment } from '../src/config/environment';
import { buildHomeAssistantConfig } from '../src/config/homeAssistant';
import { loadConfig, resolveSettings } from '../src/config';

async function withTempConfig(fn: (configPath: string) => Promise<void>): Promise<void> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'media-stack-config-'));
  try {
    await fn(path.join(dir, 'data', 'config.json'));
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}

test('a missing config file is written with defaults', async () => {
  await withTempConfig(async (configPath) => {
    const config = new ConfigAdapter(new ConfigRepository(new StorageAdapter(), configPath));
    const loaded = await config.load();
    assert.equal(loaded.system.logging.level, 'info');
    assert.equal(loaded.system.homeAssistant.url, 'ws://homeassistant.local:8123/api/websocket');
    assert.deepEqual(loaded.stacks, []);
    const written = JSON.parse(await fs.readFile(configPath, 'utf8'));
    assert.deepEqual(written.stacks, []);
  });
});

test('stacks are validated and get an id from their name', async () => {
  await withTempConfig(async (configPath) => {
    await fs.mkdir(path.dirname(configPath), { recursive: true });
    await fs.writeFile(
      configPath,
      JSON.stringify({
        system: { logging: { level: 'debug' } },
        stacks: [{ name: 'Living Room', mapping: { 'media_player.receiver': { 'HDMI 1': 'media_player.pvr' } } }],
      }),
    );
    const config = new ConfigAdapter(new ConfigRepository(new StorageAdapter(), configPath));
    const loaded = await config.load();
    assert.equal(loaded.system.logging.level, 'debug');
    assert.equal(loaded.system.logging.json, false);
    assert.deepEqual(loaded.stacks, [
      {
        id: 'living_room',
        name: 'Living Room',
        mapping: { 'media_player.receiver': { 'HDMI 1': 'media_player.pvr' } },
      },
    ]);
  });
});

test('an unparsable config file is left in place', async () => {
  await withTempConfig(async (configPath) => {
    await fs.mkdir(path.dirname(configPath), { recursive: true });
    await fs.writeFile(configPath, '{bad-json');
    const config = new ConfigAdapter(new ConfigRepository(new StorageAdapter(), configPath));
    const loaded = await config.load();
    assert.deepEqual(loaded.stacks, []);
    assert.equal(await fs.readFile(configPath, 'utf8'), '{bad-json');
  });
});

test('invalid device ids are reported with their path', () => {
  assert.throws(
    () => parseServerConfig({ stacks: [{ name: 'Den', mapping: { 'Den TV': {} } }] }),
    (error: unknown) => {
      assert.ok(error instanceof ConfigValidationError);
      assert.equal(error.issues.length, 1);
      assert.equal(error.issues[0], 'stacks.0.mapping.Den TV: expected an entity id like media_player.tv');
      return true;
    },
  );
});

test('device ids padded with whitespace are rejected instead of merged', () => {
  assert.throws(
    () =>
      parseServerConfig({
        stacks: [{ name: 'Den', mapping: { ' media_player.tv': {}, 'media_player.tv': { AUX: 'media_player.pvr ' } } }],
      }),
    (error: unknown) => {
      assert.ok(error instanceof ConfigValidationError);
      assert.deepEqual(error.issues, [
        'stacks.0.mapping. media_player.tv: expected an entity id like media_player.tv',
        'stacks.0.mapping.media_player.tv.AUX: expected an entity id like media_player.tv',
      ]);
      return true;
    },
  );
});

test('duplicate stack ids are rejected', () => {
  assert.throws(
    () =>
      parseServerConfig({
        stacks: [
          { name: 'Den', mapping: {} },
          { id: 'den', name: 'Other', mapping: {} },
        ],
      }),
    /duplicate stack id den/,
  );
});

test('slugs drop accents and punctuation', () => {
  assert.equal(slugify('Wohnzimmer Süd'), 'wohnzimmer_sud');
  assert.equal(slugify('  Kids\' Room!! '), 'kids_room');
  assert.equal(slugify('***'), 'media_stack');
});

test('environment overrides the stored Home Assistant connection', () => {
  const env = loadEnvironment({ HA_URL: 'ws://ha.test:8123/api/websocket', HTTP_PORT: '8080', LOG_LEVEL: 'warn' });
  assert.equal(env.httpPort, 8080);
  assert.equal(env.logLevel, 'warn');
  const merged = buildHomeAssistantConfig(env, { url: 'ws://stored/api/websocket', token: 'test-secret' });
  assert.deepEqual(merged, { url: 'ws://ha.test:8123/api/websocket', token: 'test-secret' });

  const fallback = loadEnvironment({ HTTP_PORT: 'not-a-port', LOG_LEVEL: 'loud' });
  assert.equal(fallback.httpPort, 7190);
  assert.equal(fallback.logLevel, null);
});

test('resolved settings prefer the environment log level', () => {
  const system = parseServerConfig({ system: { logging: { level: 'debug', json: true } } }).system;

  const fromFile = resolveSettings(loadConfig({}), system);
  assert.equal(fromFile.logLevel, 'debug');
  assert.equal(fromFile.logJson, true);
  assert.deepEqual(fromFile.homeAssistant, { url: 'ws://homeassistant.local:8123/api/websocket', token: '' });

  const overridden = resolveSettings(loadConfig({ LOG_LEVEL: 'error', HA_TOKEN: 'test-secret' }), system);
  assert.equal(overridden.logLevel, 'error');
  assert.equal(overridden.homeAssistant.token, 'test-secret');
});
