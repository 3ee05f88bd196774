import 'tsconfig-paths/register';
import { logManager } from '../src/shared/logging/logger';
import { runCase, tests } from './testHarness';
import './architecture/importBoundaries.test';
import './sourceResolver.test';
import './compositeState.test';
import './switchExecutor.test';
import './mediaStack.test';
import './configRepository.test';
import './homeAssistantDevices.test';
import './homeAssistantClient.test';
import './jsonBody.test';
import './stackApi.test';
import './stateGateway.test';
import './logger.test';
import './runtimeShutdown.test';

async function run(): Promise<void> {
  logManager.configure({ level: 'none' });
  let failures = 0;
  for (const testCase of tests) {
    const { name } = testCase;
    try {
      await runCase(testCase);
      console.log(`ok - ${name}`);
    } catch (error) {
      failures += 1;
      console.error(`not ok - ${name}`);
      console.error(error);
    }
  }
  console.log(`${tests.length - failures}/${tests.length} passed`);
  if (failures > 0) {
    process.exitCode = 1;
  }
}

void run();
