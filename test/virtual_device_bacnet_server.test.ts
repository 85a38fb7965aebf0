import { expect } from 'chai';
import sinon from 'sinon';
import Bacnet from 'bacstack';

import { silentLogger } from '../lib/logger';
import { VirtualDevice } from '../lib/virtualDevice';
import {
  APPLICATION_TAG,
  BacnetRequestHandlers,
  BacnetServerClient,
  OBJECT_TYPE,
  PROPERTY_ID,
  VirtualBacnetServer,
  bitStringForBits,
  decodeWrittenValue,
  encodePointValue,
  kindForObjectType,
} from '../scripts/virtual-device/bacnetServer';
import { testSettings } from './test_utils';

const BacnetEnums = Bacnet.enum;
const REMOTE = '192.168.1.50';

class FakeClient implements BacnetServerClient {
  readonly iAms: Array<{ deviceId: number; segmentation: number; vendorId: number }> = [];

  readonly reads: Array<{ invokeId: number; objectId: Bacnet.ObjectId; property: Bacnet.PropertyRef; values: Bacnet.BacnetValue[] }> = [];

  readonly multiReads: Array<{ invokeId: number; values: Bacnet.ReadAccessResult[] }> = [];

  readonly errors: Array<{ service: number; invokeId: number; errorClass: number; errorCode: number }> = [];

  readonly acks: Array<{ service: number; invokeId: number }> = [];

  closed = false;

  iAmResponse(deviceId: number, segmentation: number, vendorId: number) {
    this.iAms.push({ deviceId, segmentation, vendorId });
  }

  readPropertyResponse(
    _receiver: string,
    invokeId: number,
    objectId: Bacnet.ObjectId,
    property: Bacnet.PropertyRef,
    values: Bacnet.BacnetValue[],
  ) {
    this.reads.push({
      invokeId, objectId, property, values,
    });
  }

  readPropertyMultipleResponse(_receiver: string, invokeId: number, values: Bacnet.ReadAccessResult[]) {
    this.multiReads.push({ invokeId, values });
  }

  errorResponse(_receiver: string, service: number, invokeId: number, errorClass: number, errorCode: number) {
    this.errors.push({
      service, invokeId, errorClass, errorCode,
    });
  }

  simpleAckResponse(_receiver: string, service: number, invokeId: number) {
    this.acks.push({ service, invokeId });
  }

  close() {
    this.closed = true;
  }
}

function createDevice() {
  const device = new VirtualDevice({
    identity: { deviceId: 4001, deviceName: 'Test VAV', vendorId: 999 },
    settings: testSettings({ seed: 3 }),
  });
  device.definePoint({
    kind: 'analogOutput', instance: 5, name: 'HeatSetpoint', initialValue: 50, units: 'degreesCelsius',
  });
  device.definePoint({
    kind: 'analogInput', instance: 1, name: 'InletTemperature', initialValue: 12, units: 'degreesCelsius',
  });
  device.definePoint({
    kind: 'binaryOutput', instance: 1, name: 'OccupiedCommand', initialValue: true,
  });
  device.definePoint({
    kind: 'multistateValue',
    instance: 1,
    name: 'OperationStatus',
    initialValue: 3,
    stateText: ['Cooling', 'Heating', 'Ventilating', 'Fault'],
  });
  return device;
}

function startServer(device: VirtualDevice, periodicIAmMs = 0) {
  const client = new FakeClient();
  const captured: { handlers?: BacnetRequestHandlers; options?: Bacnet.ClientOptions } = {};
  const server = new VirtualBacnetServer(device, {
    port: 47809,
    bindAddress: '127.0.0.1',
    logTraffic: false,
    logger: silentLogger,
    periodicIAmMs,
    createClient: (options, handlers) => {
      captured.options = options;
      captured.handlers = handlers;
      return client;
    },
  });
  server.start();
  const { handlers, options } = captured;
  if (!handlers || !options) throw new Error('client factory was not called');
  return {
    server, client, handlers, options,
  };
}

function objectId(type: number, instance: number): Bacnet.ObjectId {
  return { type, instance };
}

describe('VirtualBacnetServer', () => {
  afterEach(() => {
    sinon.restore();
  });

  it('opens the client on the configured port and closes it on stop', () => {
    const { server, client, options } = startServer(createDevice());
    expect(options.port).to.equal(47809);
    expect(options.interface).to.equal('127.0.0.1');
    expect(server.listening).to.equal(true);

    server.stop();
    expect(client.closed).to.equal(true);
    expect(server.listening).to.equal(false);
  });

  it('answers Who-Is within the requested instance range', () => {
    const { client, handlers } = startServer(createDevice());

    handlers.whoIs({ address: REMOTE });
    handlers.whoIs({ address: REMOTE, lowLimit: 5000, highLimit: 6000 });
    handlers.whoIs({ address: REMOTE, lowLimit: 1, highLimit: 4000 });
    handlers.whoIs({ address: REMOTE, lowLimit: 4001, highLimit: 4001 });

    expect(client.iAms).to.deep.equal([
      { deviceId: 4001, segmentation: BacnetEnums.Segmentation.NO_SEGMENTATION, vendorId: 999 },
      { deviceId: 4001, segmentation: BacnetEnums.Segmentation.NO_SEGMENTATION, vendorId: 999 },
    ]);
  });

  it('broadcasts I-Am periodically when configured', () => {
    const clock = sinon.useFakeTimers();
    const { server, client } = startServer(createDevice(), 1000);

    clock.tick(3000);
    expect(client.iAms).to.have.length(3);

    server.stop();
    clock.tick(3000);
    expect(client.iAms).to.have.length(3);
  });

  describe('ReadProperty', () => {
    it('reads present values with the wire type of each object family', () => {
      const { client, handlers } = startServer(createDevice());

      handlers.readProperty({
        address: REMOTE,
        invokeId: 1,
        request: { objectId: objectId(OBJECT_TYPE.ANALOG_OUTPUT, 5), property: { id: PROPERTY_ID.PRESENT_VALUE } },
      });
      handlers.readProperty({
        address: REMOTE,
        invokeId: 2,
        request: { objectId: objectId(OBJECT_TYPE.BINARY_OUTPUT, 1), property: { id: PROPERTY_ID.PRESENT_VALUE } },
      });
      handlers.readProperty({
        address: REMOTE,
        invokeId: 3,
        request: { objectId: objectId(OBJECT_TYPE.MULTI_STATE_VALUE, 1), property: { id: PROPERTY_ID.PRESENT_VALUE } },
      });

      expect(client.reads.map((read) => read.values)).to.deep.equal([
        [{ type: APPLICATION_TAG.REAL, value: 50 }],
        [{ type: APPLICATION_TAG.ENUMERATED, value: 1 }],
        [{ type: APPLICATION_TAG.UNSIGNED_INTEGER, value: 3 }],
      ]);
      expect(client.errors).to.deep.equal([]);
    });

    it('reads priority array entries by index', () => {
      const device = createDevice();
      device.writePriority('analogOutput', 5, 8, 75);
      const { client, handlers } = startServer(device);
      const read = (invokeId: number, index: number) => handlers.readProperty({
        address: REMOTE,
        invokeId,
        request: { objectId: objectId(OBJECT_TYPE.ANALOG_OUTPUT, 5), property: { id: PROPERTY_ID.PRIORITY_ARRAY, index } },
      });

      read(1, 0);
      read(2, 8);
      read(3, 1);
      read(4, 17);

      expect(client.reads.map((entry) => entry.values)).to.deep.equal([
        [{ type: APPLICATION_TAG.UNSIGNED_INTEGER, value: 16 }],
        [{ type: APPLICATION_TAG.REAL, value: 75 }],
        [{ type: APPLICATION_TAG.NULL, value: null }],
      ]);
      expect(client.errors).to.deep.equal([{
        service: BacnetEnums.ConfirmedServiceChoice.READ_PROPERTY,
        invokeId: 4,
        errorClass: BacnetEnums.ErrorClass.PROPERTY,
        errorCode: BacnetEnums.ErrorCode.INVALID_ARRAY_INDEX,
      }]);
    });

    it('rejects unknown objects and properties', () => {
      const { client, handlers } = startServer(createDevice());

      handlers.readProperty({
        address: REMOTE,
        invokeId: 7,
        request: { objectId: objectId(OBJECT_TYPE.ANALOG_VALUE, 9), property: { id: PROPERTY_ID.PRESENT_VALUE } },
      });
      handlers.readProperty({
        address: REMOTE,
        invokeId: 8,
        request: { objectId: objectId(OBJECT_TYPE.ANALOG_INPUT, 1), property: { id: PROPERTY_ID.PRIORITY_ARRAY } },
      });

      expect(client.errors.map(({ errorClass, errorCode }) => ({ errorClass, errorCode }))).to.deep.equal([
        { errorClass: BacnetEnums.ErrorClass.OBJECT, errorCode: BacnetEnums.ErrorCode.UNKNOWN_OBJECT },
        { errorClass: BacnetEnums.ErrorClass.PROPERTY, errorCode: BacnetEnums.ErrorCode.UNKNOWN_PROPERTY },
      ]);
    });

    it('reads device identity and the object list', () => {
      const { client, handlers } = startServer(createDevice());
      const device = objectId(OBJECT_TYPE.DEVICE, 4001);

      handlers.readProperty({
        address: REMOTE, invokeId: 1, request: { objectId: device, property: { id: PROPERTY_ID.OBJECT_NAME } },
      });
      handlers.readProperty({
        address: REMOTE, invokeId: 2, request: { objectId: device, property: { id: PROPERTY_ID.OBJECT_LIST, index: 0 } },
      });
      handlers.readProperty({
        address: REMOTE, invokeId: 3, request: { objectId: device, property: { id: PROPERTY_ID.OBJECT_LIST, index: 2 } },
      });

      expect(client.reads.map((entry) => entry.values)).to.deep.equal([
        [{ type: APPLICATION_TAG.CHARACTER_STRING, value: 'Test VAV' }],
        [{ type: APPLICATION_TAG.UNSIGNED_INTEGER, value: 5 }],
        [{ type: APPLICATION_TAG.OBJECTIDENTIFIER, value: { type: OBJECT_TYPE.ANALOG_OUTPUT, instance: 5 } }],
      ]);
    });
  });

  describe('ReadPropertyMultiple', () => {
    it('expands ALL to the supported properties of a point', () => {
      const { client, handlers } = startServer(createDevice());

      handlers.readPropertyMultiple({
        address: REMOTE,
        invokeId: 11,
        request: {
          properties: [{
            objectId: objectId(OBJECT_TYPE.MULTI_STATE_VALUE, 1),
            properties: [{ id: PROPERTY_ID.ALL }],
          }],
        },
      });

      expect(client.multiReads).to.have.length(1);
      const [result] = client.multiReads[0].values;
      expect(result.values).to.have.length(13);
      const numberOfStates = result.values.find((entry) => entry.property.id === PROPERTY_ID.NUMBER_OF_STATES);
      expect(numberOfStates?.value).to.deep.equal([{ type: APPLICATION_TAG.UNSIGNED_INTEGER, value: 4 }]);
      const stateText = result.values.find((entry) => entry.property.id === PROPERTY_ID.STATE_TEXT);
      expect(stateText?.value.map((entry) => entry.value)).to.deep.equal(['Cooling', 'Heating', 'Ventilating', 'Fault']);
    });

    it('embeds errors for properties that cannot be read', () => {
      const { client, handlers } = startServer(createDevice());

      handlers.readPropertyMultiple({
        address: REMOTE,
        invokeId: 12,
        request: {
          properties: [{
            objectId: objectId(OBJECT_TYPE.BINARY_OUTPUT, 1),
            properties: [{ id: PROPERTY_ID.OBJECT_NAME }, { id: PROPERTY_ID.UNITS }],
          }],
        },
      });

      const [result] = client.multiReads[0].values;
      expect(result.values[0].value).to.deep.equal([{ type: APPLICATION_TAG.CHARACTER_STRING, value: 'OccupiedCommand' }]);
      expect(result.values[1].value).to.deep.equal([{
        type: APPLICATION_TAG.ERROR,
        value: {
          type: 'BacnetError',
          errorClass: BacnetEnums.ErrorClass.PROPERTY,
          errorCode: BacnetEnums.ErrorCode.UNKNOWN_PROPERTY,
        },
      }]);
    });
  });

  describe('WriteProperty', () => {
    function write(
      handlers: BacnetRequestHandlers,
      invokeId: number,
      target: Bacnet.ObjectId,
      value: Bacnet.BacnetValue,
      priority?: number,
      propertyId: number = PROPERTY_ID.PRESENT_VALUE,
    ) {
      handlers.writeProperty({
        address: REMOTE,
        invokeId,
        request: { objectId: target, value: { property: { id: propertyId }, value: [value], priority } },
      });
    }

    it('commands and relinquishes priority slots', () => {
      const device = createDevice();
      const { client, handlers } = startServer(device);
      const damper = objectId(OBJECT_TYPE.ANALOG_OUTPUT, 5);

      write(handlers, 1, damper, { type: APPLICATION_TAG.REAL, value: 75 }, 8);
      expect(device.getEffectiveValue('analogOutput', 5)).to.deep.equal({ ok: true, value: 75 });

      write(handlers, 2, damper, { type: APPLICATION_TAG.NULL, value: null }, 8);
      expect(device.getEffectiveValue('analogOutput', 5)).to.deep.equal({ ok: true, value: 50 });

      write(handlers, 3, damper, { type: APPLICATION_TAG.REAL, value: 40 });
      const detail = device.describePoint('analogOutput', 5);
      expect(detail.ok && detail.value.activePriority).to.equal(16);

      expect(client.acks.map((ack) => ack.invokeId)).to.deep.equal([1, 2, 3]);
      expect(client.errors).to.deep.equal([]);
    });

    it('maps write failures to BACnet errors', () => {
      const { client, handlers } = startServer(createDevice());

      write(handlers, 1, objectId(OBJECT_TYPE.ANALOG_INPUT, 1), { type: APPLICATION_TAG.REAL, value: 1 }, 8);
      write(handlers, 2, objectId(OBJECT_TYPE.ANALOG_OUTPUT, 5), { type: APPLICATION_TAG.REAL, value: 1 }, 17);
      write(handlers, 3, objectId(OBJECT_TYPE.BINARY_OUTPUT, 1), { type: APPLICATION_TAG.ENUMERATED, value: 5 }, 8);
      write(handlers, 4, objectId(OBJECT_TYPE.ANALOG_OUTPUT, 99), { type: APPLICATION_TAG.REAL, value: 1 }, 8);
      write(
        handlers,
        5,
        objectId(OBJECT_TYPE.ANALOG_OUTPUT, 5),
        { type: APPLICATION_TAG.CHARACTER_STRING, value: 'x' },
        8,
        PROPERTY_ID.OBJECT_NAME,
      );
      write(handlers, 6, objectId(OBJECT_TYPE.ANALOG_OUTPUT, 5), { type: APPLICATION_TAG.CHARACTER_STRING, value: 'x' }, 8);

      expect(client.acks).to.deep.equal([]);
      expect(client.errors.map(({ invokeId, errorClass, errorCode }) => ({ invokeId, errorClass, errorCode }))).to.deep.equal([
        { invokeId: 1, errorClass: BacnetEnums.ErrorClass.PROPERTY, errorCode: BacnetEnums.ErrorCode.WRITE_ACCESS_DENIED },
        { invokeId: 2, errorClass: BacnetEnums.ErrorClass.SERVICES, errorCode: BacnetEnums.ErrorCode.PARAMETER_OUT_OF_RANGE },
        { invokeId: 3, errorClass: BacnetEnums.ErrorClass.PROPERTY, errorCode: BacnetEnums.ErrorCode.INVALID_DATA_TYPE },
        { invokeId: 4, errorClass: BacnetEnums.ErrorClass.OBJECT, errorCode: BacnetEnums.ErrorCode.UNKNOWN_OBJECT },
        { invokeId: 5, errorClass: BacnetEnums.ErrorClass.PROPERTY, errorCode: BacnetEnums.ErrorCode.WRITE_ACCESS_DENIED },
        { invokeId: 6, errorClass: BacnetEnums.ErrorClass.PROPERTY, errorCode: BacnetEnums.ErrorCode.INVALID_DATA_TYPE },
      ]);
    });

    it('stops a WritePropertyMultiple at the first failing entry', () => {
      const device = createDevice();
      const { client, handlers } = startServer(device);

      handlers.writePropertyMultiple({
        address: REMOTE,
        invokeId: 21,
        request: {
          objectId: objectId(OBJECT_TYPE.ANALOG_OUTPUT, 5),
          values: [
            { property: { id: PROPERTY_ID.PRESENT_VALUE }, value: [{ type: APPLICATION_TAG.REAL, value: 61 }], priority: 9 },
            { property: { id: PROPERTY_ID.PRESENT_VALUE }, value: [{ type: APPLICATION_TAG.REAL, value: 62 }], priority: 0.5 },
          ],
        },
      });

      expect(device.getEffectiveValue('analogOutput', 5)).to.deep.equal({ ok: true, value: 61 });
      expect(client.acks).to.deep.equal([]);
      expect(client.errors).to.deep.equal([{
        service: BacnetEnums.ConfirmedServiceChoice.WRITE_PROPERTY_MULTIPLE,
        invokeId: 21,
        errorClass: BacnetEnums.ErrorClass.SERVICES,
        errorCode: BacnetEnums.ErrorCode.PARAMETER_OUT_OF_RANGE,
      }]);
    });
  });

  describe('value codecs', () => {
    it('maps object types to point kinds', () => {
      expect(kindForObjectType(OBJECT_TYPE.MULTI_STATE_OUTPUT)).to.equal('multistateOutput');
      expect(kindForObjectType(OBJECT_TYPE.DEVICE)).to.equal(undefined);
    });

    it('encodes values by family', () => {
      const device = createDevice();
      const binary = device.getPoint('binaryOutput', 1);
      if (!binary.ok) throw new Error(binary.message);
      expect(encodePointValue(binary.value, false)).to.deep.equal({ type: APPLICATION_TAG.ENUMERATED, value: 0 });
    });

    it('decodes written values', () => {
      expect(decodeWrittenValue({ type: APPLICATION_TAG.NULL, value: null })).to.equal(null);
      expect(decodeWrittenValue({ type: APPLICATION_TAG.REAL, value: 21.5 })).to.equal(21.5);
      expect(decodeWrittenValue({ type: APPLICATION_TAG.BOOLEAN, value: true })).to.equal(true);
      expect(decodeWrittenValue({ type: APPLICATION_TAG.CHARACTER_STRING, value: 'on' })).to.equal(undefined);
      expect(decodeWrittenValue(undefined)).to.equal(undefined);
    });

    it('packs bit strings least significant bit first', () => {
      expect(bitStringForBits(10, [0, 3, 9, 12])).to.deep.equal({ bitsUsed: 10, value: [9, 2] });
    });
  });
});
