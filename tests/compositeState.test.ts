import assert from 'node:assert/strict';
import { test } from './testHarness';
import { MediaFeature } from '../src/domain/stack/features';
import { resolveStackView } from '../src/domain/stack/compositeState';
import { selectSink } from '../src/domain/stack/sinkSelector';
import { allDevices, buildWiringMap } from '../src/domain/stack/wiringMap';
import { device, FakeDevices } from './fakes/devicePort';
import { CONSOLE, PVR, RECEIVER, livingRoomMapping, livingRoomStates } from './fixtures/livingRoom';

const TV = 'media_player.tv';

function view(devices: FakeDevices, mapping = livingRoomMapping) {
  return resolveStackView(buildWiringMap(mapping), (id) => devices.getState(id));
}

test('allDevices lists keys and targets once in first-seen order', () => {
  const map = buildWiringMap({
    [TV]: { 'HDMI 1': RECEIVER },
    [RECEIVER]: { 'HDMI 1': PVR, 'HDMI 2': CONSOLE },
  });
  assert.deepEqual(allDevices(map), [TV, RECEIVER, PVR, CONSOLE]);
});

test('sink is the first configured device that is powered', () => {
  const map = buildWiringMap({
    [TV]: { 'HDMI 1': RECEIVER },
    [RECEIVER]: { 'HDMI 1': PVR },
  });
  const devices = new FakeDevices([device(TV, { status: 'off' }), device(RECEIVER, { status: 'on' })]);
  assert.equal(selectSink(map, (id) => devices.getState(id)), RECEIVER);

  devices.setState(device(TV, { status: 'on' }));
  assert.equal(selectSink(map, (id) => devices.getState(id)), TV);
});

test('sink falls back to the first key when everything is off', () => {
  const map = buildWiringMap({ [TV]: {}, [RECEIVER]: {} });
  const devices = new FakeDevices([device(TV, { status: 'off' }), device(RECEIVER, { status: 'standby' })]);
  assert.equal(selectSink(map, (id) => devices.getState(id)), TV);
});

test('sink skips configured devices without a snapshot', () => {
  const map = buildWiringMap({ [TV]: {}, [RECEIVER]: {} });
  const devices = new FakeDevices([device(RECEIVER, { status: 'on' })]);
  assert.equal(selectSink(map, (id) => devices.getState(id)), RECEIVER);
});

test('an empty wiring map has no sink', () => {
  assert.equal(selectSink(buildWiringMap({}), () => null), null);
});

test('composite state reports the live source and the sink volume', () => {
  const { state } = view(new FakeDevices(livingRoomStates()));
  assert.equal(state.status, 'on');
  assert.equal(state.source, 'PVR: BBC');
  assert.deepEqual(state.sourceList, ['Console', 'PVR: BBC', 'PVR: ITV', 'Receiver: Radio']);
  assert.equal(state.volumeLevel, 0.4);
  assert.equal(state.isVolumeMuted, false);
  assert.equal(state.sourceDeviceId, PVR);
  assert.equal(state.sinkDeviceId, RECEIVER);
  assert.deepEqual(state.attributes, { media_title: 'Evening News' });
});

test('composite status follows the live source', () => {
  const playing = view(new FakeDevices(livingRoomStates({ pvr: { status: 'playing' } })));
  assert.equal(playing.state.status, 'playing');
  const paused = view(new FakeDevices(livingRoomStates({ pvr: { status: 'paused' } })));
  assert.equal(paused.state.status, 'paused');
});

test('composite state is standby when every device is off', () => {
  const { state, activeLeaf } = view(
    new FakeDevices(
      livingRoomStates({ receiver: { status: 'off' }, pvr: { status: 'off' }, console: { status: 'off' } }),
    ),
  );
  assert.equal(activeLeaf, null);
  assert.equal(state.status, 'standby');
  assert.equal(state.source, null);
  assert.equal(state.sourceDeviceId, null);
  assert.equal(state.sinkDeviceId, RECEIVER);
  assert.deepEqual(state.sourceList, ['Console', 'PVR: BBC', 'PVR: ITV', 'Receiver: Radio']);
  assert.deepEqual(state.attributes, {});
});

test('a powered-off source leaves the receiver input as the source', () => {
  const { state } = view(new FakeDevices(livingRoomStates({ pvr: { status: 'off' } })));
  assert.equal(state.status, 'on');
  assert.equal(state.source, 'Receiver: HDMI 1');
  assert.equal(state.sourceDeviceId, RECEIVER);
});

test('features combine source transport, sink volume and any-device browsing', () => {
  const { state } = view(new FakeDevices(livingRoomStates()));
  const expected =
    MediaFeature.PAUSE |
    MediaFeature.PLAY |
    MediaFeature.SELECT_SOURCE |
    MediaFeature.VOLUME_SET |
    MediaFeature.VOLUME_MUTE |
    MediaFeature.BROWSE_MEDIA |
    MediaFeature.PLAY_MEDIA;
  assert.equal(state.supportedFeatures, expected);
});

test('volume features come from the sink only', () => {
  const { state } = view(
    new FakeDevices(
      livingRoomStates({
        receiver: { supportedFeatures: 0 },
        pvr: { supportedFeatures: MediaFeature.VOLUME_STEP | MediaFeature.PAUSE },
        console: { supportedFeatures: 0 },
      }),
    ),
  );
  assert.equal(state.supportedFeatures, MediaFeature.PAUSE | MediaFeature.SELECT_SOURCE);
});

test('a downstream key takes over as sink when the upstream key is off', () => {
  const mapping = {
    [TV]: { 'HDMI 1': RECEIVER },
    [RECEIVER]: { 'HDMI 1': PVR, 'HDMI 2': CONSOLE },
  };
  const devices = new FakeDevices([
    device(TV, { name: 'TV', status: 'off', source: 'HDMI 1', sourceList: ['HDMI 1'] }),
    ...livingRoomStates(),
  ]);
  const { state } = view(devices, mapping);
  assert.equal(state.sinkDeviceId, RECEIVER);
  assert.equal(state.status, 'on');
  assert.equal(state.source, 'PVR: BBC');
  assert.equal(state.sourceDeviceId, PVR);
});

test('a device that is only a wired target never becomes the sink', () => {
  const devices = new FakeDevices([
    device(TV, { name: 'TV', status: 'off', source: 'HDMI 1', sourceList: ['HDMI 1'] }),
    ...livingRoomStates(),
  ]);
  const { state } = view(devices, { [TV]: { 'HDMI 1': RECEIVER } });
  assert.equal(state.sinkDeviceId, TV);
  assert.equal(state.status, 'standby');
  assert.equal(state.source, null);
});

test('a cycle back to the sink ends the composite source on the looping device', () => {
  const stereo = 'media_player.stereo';
  const devices = new FakeDevices([
    device(stereo, { source: 'DISPLAY', sourceList: ['DISPLAY'] }),
    device(TV, { source: 'HDMI 1', sourceList: ['HDMI 1'] }),
  ]);
  const { state } = view(devices, {
    [stereo]: { DISPLAY: TV },
    [TV]: { 'HDMI 1': stereo },
  });
  assert.equal(state.sinkDeviceId, stereo);
  assert.equal(state.status, 'on');
  assert.equal(state.source, 'tv: HDMI 1');
  assert.equal(state.sourceDeviceId, TV);
  assert.deepEqual(state.sourceList, ['tv: HDMI 1']);
});

test('the reported source is listed while the wired device is off', () => {
  const { state } = view(new FakeDevices(livingRoomStates({ pvr: { status: 'off' } })));
  assert.equal(state.source, 'Receiver: HDMI 1');
  assert.deepEqual(state.sourceList, ['Console', 'PVR: BBC', 'PVR: ITV', 'Receiver: HDMI 1', 'Receiver: Radio']);
});
