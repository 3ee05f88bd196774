import assert from 'node:assert/strict';
import { test } from './testHarness';
import { resolveStackView } from '../src/domain/stack/compositeState';
import { findNode } from '../src/domain/stack/sourceResolver';
import { buildWiringMap } from '../src/domain/stack/wiringMap';
import { createLogger } from '../src/shared/logging/logger';
import { planRoute, selectSource } from '../src/application/stack/switchExecutor';
import { CommandFailedError, SourceNotFoundError } from '../src/application/stack/stackErrors';
import { FakeDevices } from './fakes/devicePort';
import { CONSOLE, PVR, RECEIVER, livingRoomMapping, livingRoomStates, type LivingRoomOverrides } from './fixtures/livingRoom';

const log = createLogger('Test', 'Switch');
const map = buildWiringMap(livingRoomMapping);

function setup(overrides: LivingRoomOverrides = {}) {
  const devices = new FakeDevices(livingRoomStates(overrides));
  const tree = () => resolveStackView(map, (id) => devices.getState(id)).tree;
  return { devices, tree };
}

test('switching to another device selects the receiver input leading to it', async () => {
  const { devices, tree } = setup();
  const report = await selectSource(devices, tree(), 'Console', log);
  assert.deepEqual(report.hops, [
    { deviceId: RECEIVER, source: 'HDMI 2' },
    { deviceId: CONSOLE, source: null },
  ]);
  assert.equal(report.commandsIssued, 1);
  assert.deepEqual(devices.calls, [
    { deviceId: RECEIVER, command: { kind: 'select_source', source: 'HDMI 2' } },
  ]);
});

test('devices already on the right input receive no command', async () => {
  const { devices, tree } = setup();
  const first = await selectSource(devices, tree(), 'PVR: ITV', log);
  assert.equal(first.commandsIssued, 1);
  assert.deepEqual(devices.calls, [{ deviceId: PVR, command: { kind: 'select_source', source: 'ITV' } }]);

  const second = await selectSource(devices, tree(), 'PVR: ITV', log);
  assert.equal(second.commandsIssued, 0);
  assert.equal(devices.calls.length, 1);
});

test('powered-off hops are turned on before their input changes', async () => {
  const { devices, tree } = setup({ receiver: { status: 'off', source: 'Radio' }, pvr: { status: 'off' } });
  const report = await selectSource(devices, tree(), 'PVR: ITV', log);
  assert.equal(report.commandsIssued, 4);
  assert.deepEqual(
    devices.calls.map((call) => [call.deviceId, call.command.kind]),
    [
      [RECEIVER, 'turn_on'],
      [RECEIVER, 'select_source'],
      [PVR, 'turn_on'],
      [PVR, 'select_source'],
    ],
  );
});

test('an unknown label fails before any command is sent', async () => {
  const { devices, tree } = setup();
  await assert.rejects(selectSource(devices, tree(), 'Turntable', log), (error: unknown) => {
    assert.ok(error instanceof SourceNotFoundError);
    assert.equal(error.message, 'Unable to find source Turntable');
    return true;
  });
  assert.equal(devices.calls.length, 0);
});

test('a failing hop stops the switch and names the device', async () => {
  const { devices, tree } = setup({ receiver: { source: 'Radio' } });
  devices.failOn(RECEIVER, 'select_source');
  await assert.rejects(selectSource(devices, tree(), 'PVR: ITV', log), (error: unknown) => {
    assert.ok(error instanceof CommandFailedError);
    assert.equal(error.deviceId, RECEIVER);
    assert.equal(error.command, 'select_source');
    assert.equal(error.message, 'select_source failed on media_player.receiver: device unreachable');
    return true;
  });
  assert.equal(devices.calls.length, 1);
});

test('routes to a device leave its own input alone', () => {
  const { tree } = setup();
  const node = findNode(tree(), PVR);
  assert.ok(node);
  assert.deepEqual(planRoute(node), [
    { deviceId: RECEIVER, source: 'HDMI 1' },
    { deviceId: PVR, source: null },
  ]);
});
