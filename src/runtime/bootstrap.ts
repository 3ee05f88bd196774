import { loadConfig, resolveSettings } from '@/config';
import { createLogger, logManager } from '@/shared/logging/logger';
import { HttpService } from '@/adapters/http/httpService';
import { StateGateway } from '@/adapters/http/ws/stateGateway';
import { HomeAssistantClient } from '@/adapters/homeassistant/homeAssistantClient';
import { HomeAssistantDevices } from '@/adapters/homeassistant/homeAssistantDevices';
import { HomeAssistantAuthError } from '@/adapters/homeassistant/types';
import { createStackManager, type StackManager } from '@/application/stack/stackManager';
import { createRuntimePorts } from '@/runtime/ports';
import { stopAll, type LifecycleService } from '@/runtime/stopWithTimeout';

export type Runtime = {
  start: () => Promise<void>;
  stop: () => Promise<void>;
};

export function createRuntime(): Runtime {
  const config = loadConfig();
  const ports = createRuntimePorts({ configPath: config.env.configPath });

  let devices: HomeAssistantDevices | null = null;
  let stackManager: StackManager | null = null;
  let httpService: HttpService | null = null;

  async function startServices(): Promise<void> {
    const storedConfig = await ports.config.load();
    const settings = resolveSettings(config, storedConfig.system);
    logManager.configure({ level: settings.logLevel, json: settings.logJson });
    const log = createLogger('Server');

    log.info('bootstrapping media stack server', {
      env: config.env.nodeEnv,
      stacks: storedConfig.stacks.length,
    });

    const { homeAssistant } = settings;
    if (!homeAssistant.token) {
      log.warn('no home assistant access token configured', { url: homeAssistant.url });
    }

    const stateFeed = new StateGateway();
    const client = new HomeAssistantClient(homeAssistant.url, homeAssistant.token);
    const activeDevices = new HomeAssistantDevices(client);
    devices = activeDevices;
    const manager = createStackManager({ devices: activeDevices, players: activeDevices, notifier: stateFeed });
    stackManager = manager;
    stateFeed.useSnapshot(() => manager.list());
    manager.replaceAll(storedConfig.stacks);

    try {
      await activeDevices.start();
    } catch (error) {
      if (error instanceof HomeAssistantAuthError) {
        throw error;
      }
      log.warn('home assistant unavailable; retrying in background', {
        url: homeAssistant.url,
        message: error instanceof Error ? error.message : String(error),
      });
    }
    manager.startAll();

    httpService = new HttpService(config.http, { stacks: manager, stateFeed });
    await httpService.start();

    log.info('startup complete');
  }

  async function stopServices(): Promise<void> {
    const log = createLogger('Server');
    const services: LifecycleService[] = [];
    const manager = stackManager;
    if (manager) {
      services.push({ name: 'stacks', stop: () => manager.stopAll() });
    }
    const activeDevices = devices;
    if (activeDevices) {
      services.push({ name: 'home-assistant', stop: () => activeDevices.stop() });
    }
    const http = httpService;
    if (http) {
      services.push({ name: 'http', stop: () => http.stop() });
    }

    const results = await stopAll(services, 6000, log);
    log.info('shutdown complete', results);

    stackManager = null;
    devices = null;
    httpService = null;
  }

  return {
    start: startServices,
    stop: stopServices,
  };
}
