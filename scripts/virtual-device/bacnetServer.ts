import Bacnet from 'bacstack';

import { Logger, consoleLogger, logError } from '../../lib/logger';
import { Point, PointValue } from '../../lib/point';
import { POINT_KINDS, PointKind } from '../../lib/pointKinds';
import { SIMULATION_PRIORITY } from '../../lib/priorityResolver';
import { PointErrorCode } from '../../lib/results';
import { EngineeringUnit } from '../../lib/units';
import { VirtualDevice } from '../../lib/virtualDevice';

const BacnetEnums = Bacnet.enum;
export const OBJECT_TYPE = BacnetEnums.ObjectType;
export const PROPERTY_ID = BacnetEnums.PropertyIdentifier;
export const APPLICATION_TAG = BacnetEnums.ApplicationTags;

const APDU_TIMEOUT_MS = 3000;
const MAX_APDU_LENGTH = 1476;

export const OBJECT_TYPE_BY_KIND: Record<PointKind, number> = {
  analogInput: OBJECT_TYPE.ANALOG_INPUT,
  analogOutput: OBJECT_TYPE.ANALOG_OUTPUT,
  analogValue: OBJECT_TYPE.ANALOG_VALUE,
  binaryInput: OBJECT_TYPE.BINARY_INPUT,
  binaryOutput: OBJECT_TYPE.BINARY_OUTPUT,
  binaryValue: OBJECT_TYPE.BINARY_VALUE,
  multistateInput: OBJECT_TYPE.MULTI_STATE_INPUT,
  multistateOutput: OBJECT_TYPE.MULTI_STATE_OUTPUT,
  multistateValue: OBJECT_TYPE.MULTI_STATE_VALUE,
};

const KIND_BY_OBJECT_TYPE = new Map<number, PointKind>(
  POINT_KINDS.map((kind) => [OBJECT_TYPE_BY_KIND[kind], kind]),
);

export function kindForObjectType(objectType: number): PointKind | undefined {
  return KIND_BY_OBJECT_TYPE.get(objectType);
}

const ENGINEERING_UNITS: Record<EngineeringUnit, number> = {
  degreesCelsius: BacnetEnums.EngineeringUnits.DEGREES_CELSIUS,
  degreesFahrenheit: BacnetEnums.EngineeringUnits.DEGREES_FAHRENHEIT,
  percent: BacnetEnums.EngineeringUnits.PERCENT,
  percentRelativeHumidity: BacnetEnums.EngineeringUnits.PERCENT_RELATIVE_HUMIDITY,
  cubicFeetPerMinute: BacnetEnums.EngineeringUnits.CUBIC_FEET_PER_MINUTE,
  litersPerSecond: BacnetEnums.EngineeringUnits.LITERS_PER_SECOND,
  pascals: BacnetEnums.EngineeringUnits.PASCALS,
  inchesOfWater: BacnetEnums.EngineeringUnits.INCHES_OF_WATER,
  noUnits: BacnetEnums.EngineeringUnits.NO_UNITS,
};

const ERROR_BY_CODE: Record<PointErrorCode, { errorClass: number; errorCode: number }> = {
  NotFound: { errorClass: BacnetEnums.ErrorClass.OBJECT, errorCode: BacnetEnums.ErrorCode.UNKNOWN_OBJECT },
  ReadOnly: { errorClass: BacnetEnums.ErrorClass.PROPERTY, errorCode: BacnetEnums.ErrorCode.WRITE_ACCESS_DENIED },
  InvalidPriority: {
    errorClass: BacnetEnums.ErrorClass.SERVICES,
    errorCode: BacnetEnums.ErrorCode.PARAMETER_OUT_OF_RANGE,
  },
  TypeMismatch: { errorClass: BacnetEnums.ErrorClass.PROPERTY, errorCode: BacnetEnums.ErrorCode.INVALID_DATA_TYPE },
  DuplicateInstance: {
    errorClass: BacnetEnums.ErrorClass.PROPERTY,
    errorCode: BacnetEnums.ErrorCode.VALUE_OUT_OF_RANGE,
  },
  InvalidDefinition: {
    errorClass: BacnetEnums.ErrorClass.PROPERTY,
    errorCode: BacnetEnums.ErrorCode.VALUE_OUT_OF_RANGE,
  },
};

export function bacnetErrorFor(code: PointErrorCode) {
  return ERROR_BY_CODE[code];
}

const DEVICE_PROPERTY_IDS: number[] = [
  PROPERTY_ID.OBJECT_IDENTIFIER,
  PROPERTY_ID.OBJECT_NAME,
  PROPERTY_ID.OBJECT_TYPE,
  PROPERTY_ID.DESCRIPTION,
  PROPERTY_ID.SYSTEM_STATUS,
  PROPERTY_ID.VENDOR_NAME,
  PROPERTY_ID.VENDOR_IDENTIFIER,
  PROPERTY_ID.MODEL_NAME,
  PROPERTY_ID.FIRMWARE_REVISION,
  PROPERTY_ID.APPLICATION_SOFTWARE_VERSION,
  PROPERTY_ID.PROTOCOL_VERSION,
  PROPERTY_ID.PROTOCOL_REVISION,
  PROPERTY_ID.PROTOCOL_SERVICES_SUPPORTED,
  PROPERTY_ID.PROTOCOL_OBJECT_TYPES_SUPPORTED,
  PROPERTY_ID.OBJECT_LIST,
  PROPERTY_ID.MAX_APDU_LENGTH_ACCEPTED,
  PROPERTY_ID.SEGMENTATION_SUPPORTED,
  PROPERTY_ID.APDU_TIMEOUT,
  PROPERTY_ID.NUMBER_OF_APDU_RETRIES,
  PROPERTY_ID.DATABASE_REVISION,
];

function pointPropertyIds(point: Point): number[] {
  const ids = [
    PROPERTY_ID.OBJECT_IDENTIFIER,
    PROPERTY_ID.OBJECT_NAME,
    PROPERTY_ID.OBJECT_TYPE,
    PROPERTY_ID.DESCRIPTION,
    PROPERTY_ID.PRESENT_VALUE,
    PROPERTY_ID.STATUS_FLAGS,
    PROPERTY_ID.EVENT_STATE,
    PROPERTY_ID.RELIABILITY,
    PROPERTY_ID.OUT_OF_SERVICE,
  ];
  if (point.family === 'analog') ids.push(PROPERTY_ID.UNITS);
  if (point.family === 'multistate') ids.push(PROPERTY_ID.NUMBER_OF_STATES, PROPERTY_ID.STATE_TEXT);
  if (point.commandable) ids.push(PROPERTY_ID.PRIORITY_ARRAY, PROPERTY_ID.RELINQUISH_DEFAULT);
  return ids;
}

export interface BacnetRequestHandlers {
  error: (error: Error) => void;
  whoIs: (request: Bacnet.WhoIsRequest) => void;
  readProperty: (request: Bacnet.ReadPropertyRequest) => void;
  readPropertyMultiple: (request: Bacnet.ReadPropertyMultipleRequest) => void;
  writeProperty: (request: Bacnet.WritePropertyRequest) => void;
  writePropertyMultiple: (request: Bacnet.WritePropertyMultipleRequest) => void;
}

/** The response side of a bacstack client, as used by the server. */
export interface BacnetServerClient {
  iAmResponse(deviceId: number, segmentation: number, vendorId: number): void;
  readPropertyResponse(
    receiver: string,
    invokeId: number,
    objectId: Bacnet.ObjectId,
    property: Bacnet.PropertyRef,
    values: Bacnet.BacnetValue[],
  ): void;
  readPropertyMultipleResponse(receiver: string, invokeId: number, values: Bacnet.ReadAccessResult[]): void;
  errorResponse(receiver: string, service: number, invokeId: number, errorClass: number, errorCode: number): void;
  simpleAckResponse(receiver: string, service: number, invokeId: number): void;
  close(): void;
}

export type BacnetClientFactory = (
  options: Bacnet.ClientOptions,
  handlers: BacnetRequestHandlers,
) => BacnetServerClient;

export const createBacstackClient: BacnetClientFactory = (options, handlers) => {
  const client = new Bacnet(options);
  client.on('error', handlers.error);
  client.on('whoIs', handlers.whoIs);
  client.on('readProperty', handlers.readProperty);
  client.on('readPropertyMultiple', handlers.readPropertyMultiple);
  client.on('writeProperty', handlers.writeProperty);
  client.on('writePropertyMultiple', handlers.writePropertyMultiple);
  return client;
};

export interface VirtualBacnetServerOptions {
  port: number;
  bindAddress?: string;
  logTraffic?: boolean;
  periodicIAmMs?: number;
  logger?: Logger;
  createClient?: BacnetClientFactory;
}

type ReadPropertyResult =
  | { ok: true; values: Bacnet.BacnetValue[] }
  | { ok: false; errorClass: number; errorCode: number };

type WriteOutcome =
  | { ok: true }
  | { ok: false; errorClass: number; errorCode: number; message: string };

function unknownProperty(): ReadPropertyResult {
  return {
    ok: false,
    errorClass: BacnetEnums.ErrorClass.PROPERTY,
    errorCode: BacnetEnums.ErrorCode.UNKNOWN_PROPERTY,
  };
}

function notAnArray(): ReadPropertyResult {
  return {
    ok: false,
    errorClass: BacnetEnums.ErrorClass.PROPERTY,
    errorCode: BacnetEnums.ErrorCode.PROPERTY_IS_NOT_AN_ARRAY,
  };
}

function invalidArrayIndex(): ReadPropertyResult {
  return {
    ok: false,
    errorClass: BacnetEnums.ErrorClass.PROPERTY,
    errorCode: BacnetEnums.ErrorCode.INVALID_ARRAY_INDEX,
  };
}

function single(type: number, value: unknown): ReadPropertyResult {
  return { ok: true, values: [{ type, value }] };
}

function bacnetErrorValue(errorClass: number, errorCode: number): Bacnet.BacnetValue[] {
  return [{
    type: APPLICATION_TAG.ERROR,
    value: {
      type: 'BacnetError',
      errorClass,
      errorCode,
    },
  }];
}

export function bitStringForBits(bitsUsed: number, setBits: number[]) {
  const used = Math.max(0, Math.floor(bitsUsed));
  const value = new Array<number>(Math.ceil(used / 8)).fill(0);
  for (const bit of setBits) {
    if (!Number.isInteger(bit) || bit < 0 || bit >= used) continue;
    value[Math.floor(bit / 8)] |= (1 << (bit % 8));
  }
  return { bitsUsed: used, value };
}

/** Encodes a point value with the application tag its object type carries on the wire. */
export function encodePointValue(point: Point, value: PointValue): Bacnet.BacnetValue {
  const numeric = typeof value === 'boolean' ? Number(value) : value;
  switch (point.family) {
    case 'analog':
      return { type: APPLICATION_TAG.REAL, value: numeric };
    case 'binary':
      return { type: APPLICATION_TAG.ENUMERATED, value: numeric === 0 ? 0 : 1 };
    case 'multistate':
      return { type: APPLICATION_TAG.UNSIGNED_INTEGER, value: numeric };
    default: {
      const exhaustive: never = point.family;
      throw new Error(`Unknown point family ${String(exhaustive)}`);
    }
  }
}

/** Decodes a written value; null is a relinquish, undefined an unsupported datatype. */
export function decodeWrittenValue(node: Bacnet.BacnetValue | undefined): PointValue | null | undefined {
  if (!node) return undefined;
  if (node.type === APPLICATION_TAG.NULL) return null;
  if (typeof node.value === 'boolean') return node.value;
  if (typeof node.value === 'number' && Number.isFinite(node.value)) return node.value;
  return undefined;
}

function formatValue(value: unknown): string {
  return typeof value === 'number' ? String(value) : JSON.stringify(value);
}

export class VirtualBacnetServer {
  private readonly device: VirtualDevice;

  private readonly options: VirtualBacnetServerOptions;

  private readonly logger: Logger;

  private client: BacnetServerClient | null = null;

  private periodicIAmTimer: ReturnType<typeof setInterval> | null = null;

  constructor(device: VirtualDevice, options: VirtualBacnetServerOptions) {
    this.device = device;
    this.options = options;
    this.logger = options.logger ?? consoleLogger;
  }

  get listening(): boolean {
    return this.client !== null;
  }

  start() {
    if (this.client) return;

    const createClient = this.options.createClient ?? createBacstackClient;
    this.client = createClient(
      {
        port: this.options.port,
        interface: this.options.bindAddress,
        apduTimeout: APDU_TIMEOUT_MS,
        apduSize: MAX_APDU_LENGTH,
      },
      {
        error: (error) => logError(this.logger, '[VirtualBacnet] Client error:', error),
        whoIs: (request) => this.handleWhoIs(request),
        readProperty: (request) => this.handleReadProperty(request),
        readPropertyMultiple: (request) => this.handleReadPropertyMultiple(request),
        writeProperty: (request) => this.handleWriteProperty(request),
        writePropertyMultiple: (request) => this.handleWritePropertyMultiple(request),
      },
    );

    const { deviceId, deviceName } = this.device.identity;
    this.logger.log(
      `[VirtualBacnet] Listening on ${this.options.bindAddress ?? '0.0.0.0'}:${this.options.port}`
      + ` as device ${deviceId} "${deviceName}" with ${this.device.registry.size} objects`,
    );

    const periodicMs = this.options.periodicIAmMs ?? 0;
    if (periodicMs > 0) {
      this.periodicIAmTimer = setInterval(() => this.announce(), periodicMs);
    }
  }

  stop() {
    if (this.periodicIAmTimer) {
      clearInterval(this.periodicIAmTimer);
      this.periodicIAmTimer = null;
    }
    if (this.client) {
      this.client.close();
      this.client = null;
    }
  }

  announce() {
    const { deviceId, vendorId } = this.device.identity;
    this.client?.iAmResponse(deviceId, BacnetEnums.Segmentation.NO_SEGMENTATION, vendorId);
  }

  private log(message: string) {
    if (this.options.logTraffic === false) return;
    this.logger.log(message);
  }

  private describeObject(objectId: Bacnet.ObjectId | undefined): string {
    if (!objectId) return '-';
    const kind = kindForObjectType(objectId.type);
    if (kind) return `${kind}:${objectId.instance}`;
    if (objectId.type === OBJECT_TYPE.DEVICE) return `device:${objectId.instance}`;
    return `${objectId.type}:${objectId.instance}`;
  }

  private handleWhoIs(request: Bacnet.WhoIsRequest) {
    if (!this.client) return;
    const { deviceId } = this.device.identity;
    const remote = request.address ?? '?';
    this.log(`[VirtualBacnet] RX whoIs from ${remote} low=${request.lowLimit ?? '-'} high=${request.highLimit ?? '-'}`);

    if (typeof request.lowLimit === 'number' && deviceId < request.lowLimit) return;
    if (typeof request.highLimit === 'number' && deviceId > request.highLimit) return;

    this.announce();
    this.log(`[VirtualBacnet] TX iAm deviceId=${deviceId}`);
  }

  private handleReadProperty(request: Bacnet.ReadPropertyRequest) {
    if (!this.client) return;
    const objectId = request.request?.objectId;
    const property = request.request?.property;
    this.log(
      `[VirtualBacnet] RX readProperty from ${request.address}`
      + ` obj=${this.describeObject(objectId)} prop=${property?.id ?? '-'}`,
    );

    if (!objectId || !property) {
      this.client.errorResponse(
        request.address,
        BacnetEnums.ConfirmedServiceChoice.READ_PROPERTY,
        request.invokeId,
        BacnetEnums.ErrorClass.SERVICES,
        BacnetEnums.ErrorCode.INVALID_TAG,
      );
      return;
    }

    const index = property.index ?? BacnetEnums.ASN1_ARRAY_ALL;
    const result = this.readPropertyValue(objectId, property.id, index);
    if (!result.ok) {
      this.log(`[VirtualBacnet] readProperty rejected -> ${result.errorClass}:${result.errorCode}`);
      this.client.errorResponse(
        request.address,
        BacnetEnums.ConfirmedServiceChoice.READ_PROPERTY,
        request.invokeId,
        result.errorClass,
        result.errorCode,
      );
      return;
    }

    this.client.readPropertyResponse(request.address, request.invokeId, objectId, property, result.values);
    this.log(`[VirtualBacnet] TX readPropertyResponse value=${formatValue(result.values[0]?.value)}`);
  }

  private handleReadPropertyMultiple(request: Bacnet.ReadPropertyMultipleRequest) {
    if (!this.client) return;
    const specs = request.request?.properties ?? [];
    this.log(`[VirtualBacnet] RX readPropertyMultiple from ${request.address} objects=${specs.length}`);

    const results = specs.map((spec) => this.buildReadAccessResult(spec));
    this.client.readPropertyMultipleResponse(request.address, request.invokeId, results);
  }

  private handleWriteProperty(request: Bacnet.WritePropertyRequest) {
    if (!this.client) return;
    const objectId = request.request?.objectId;
    const payload = request.request?.value;
    this.log(
      `[VirtualBacnet] RX writeProperty from ${request.address}`
      + ` obj=${this.describeObject(objectId)} prop=${payload?.property?.id ?? '-'}`
      + ` value=${formatValue(payload?.value?.[0]?.value)} priority=${payload?.priority ?? '-'}`,
    );

    const service = BacnetEnums.ConfirmedServiceChoice.WRITE_PROPERTY;
    if (!objectId || !payload) {
      this.client.errorResponse(
        request.address,
        service,
        request.invokeId,
        BacnetEnums.ErrorClass.SERVICES,
        BacnetEnums.ErrorCode.INVALID_TAG,
      );
      return;
    }

    const outcome = this.applyWrite(objectId, payload);
    if (!outcome.ok) {
      this.log(`[VirtualBacnet] writeProperty rejected: ${outcome.message}`);
      this.client.errorResponse(request.address, service, request.invokeId, outcome.errorClass, outcome.errorCode);
      return;
    }
    this.client.simpleAckResponse(request.address, service, request.invokeId);
  }

  private handleWritePropertyMultiple(request: Bacnet.WritePropertyMultipleRequest) {
    if (!this.client) return;
    const objectId = request.request?.objectId;
    const values = request.request?.values ?? [];
    this.log(
      `[VirtualBacnet] RX writePropertyMultiple from ${request.address}`
      + ` obj=${this.describeObject(objectId)} entries=${values.length}`,
    );

    const service = BacnetEnums.ConfirmedServiceChoice.WRITE_PROPERTY_MULTIPLE;
    if (!objectId || values.length === 0) {
      this.client.errorResponse(
        request.address,
        service,
        request.invokeId,
        BacnetEnums.ErrorClass.SERVICES,
        BacnetEnums.ErrorCode.INVALID_TAG,
      );
      return;
    }

    for (const entry of values) {
      const outcome = this.applyWrite(objectId, entry);
      if (!outcome.ok) {
        this.log(`[VirtualBacnet] writePropertyMultiple rejected: ${outcome.message}`);
        this.client.errorResponse(request.address, service, request.invokeId, outcome.errorClass, outcome.errorCode);
        return;
      }
    }
    this.client.simpleAckResponse(request.address, service, request.invokeId);
  }

  private applyWrite(objectId: Bacnet.ObjectId, payload: Bacnet.PropertyWrite): WriteOutcome {
    const kind = kindForObjectType(objectId.type);
    if (!kind) {
      const isDevice = objectId.type === OBJECT_TYPE.DEVICE && objectId.instance === this.device.identity.deviceId;
      return {
        ok: false,
        errorClass: isDevice ? BacnetEnums.ErrorClass.PROPERTY : BacnetEnums.ErrorClass.OBJECT,
        errorCode: isDevice ? BacnetEnums.ErrorCode.WRITE_ACCESS_DENIED : BacnetEnums.ErrorCode.UNKNOWN_OBJECT,
        message: `${this.describeObject(objectId)} is not writable`,
      };
    }

    if (payload.property?.id !== PROPERTY_ID.PRESENT_VALUE) {
      const known = this.device.registry.has(kind, objectId.instance);
      return {
        ok: false,
        errorClass: known ? BacnetEnums.ErrorClass.PROPERTY : BacnetEnums.ErrorClass.OBJECT,
        errorCode: known ? BacnetEnums.ErrorCode.WRITE_ACCESS_DENIED : BacnetEnums.ErrorCode.UNKNOWN_OBJECT,
        message: `property ${payload.property?.id ?? '-'} is not writable`,
      };
    }

    const value = decodeWrittenValue(payload.value?.[0]);
    if (value === undefined) {
      return {
        ok: false,
        errorClass: BacnetEnums.ErrorClass.PROPERTY,
        errorCode: BacnetEnums.ErrorCode.INVALID_DATA_TYPE,
        message: 'unsupported datatype',
      };
    }

    const priority = payload.priority === undefined || payload.priority === BacnetEnums.ASN1_NO_PRIORITY
      ? SIMULATION_PRIORITY
      : payload.priority;
    const result = this.device.writePriority(kind, objectId.instance, priority, value);
    if (!result.ok) {
      return { ok: false, ...bacnetErrorFor(result.error), message: result.message };
    }
    return { ok: true };
  }

  private buildReadAccessResult(spec: Bacnet.ReadAccessSpecification): Bacnet.ReadAccessResult {
    const { objectId } = spec;
    const properties = this.expandPropertyRefs(objectId, spec.properties ?? []);
    const values = properties.map((property) => {
      const index = property.index ?? BacnetEnums.ASN1_ARRAY_ALL;
      const result = this.readPropertyValue(objectId, property.id, index);
      return {
        property: { id: property.id, index },
        value: result.ok ? result.values : bacnetErrorValue(result.errorClass, result.errorCode),
      };
    });
    return { objectId, values };
  }

  private expandPropertyRefs(objectId: Bacnet.ObjectId, properties: Bacnet.PropertyRef[]): Bacnet.PropertyRef[] {
    const expanded: Bacnet.PropertyRef[] = [];
    const seen = new Set<string>();
    const add = (id: number, index: number) => {
      const key = `${id}:${index}`;
      if (seen.has(key)) return;
      seen.add(key);
      expanded.push({ id, index });
    };

    for (const property of properties) {
      const index = property.index ?? BacnetEnums.ASN1_ARRAY_ALL;
      const special = property.id === PROPERTY_ID.ALL
        || property.id === PROPERTY_ID.REQUIRED
        || property.id === PROPERTY_ID.OPTIONAL;
      if (!special) {
        add(property.id, index);
        continue;
      }
      for (const id of this.supportedPropertyIds(objectId)) add(id, BacnetEnums.ASN1_ARRAY_ALL);
    }
    return expanded;
  }

  private supportedPropertyIds(objectId: Bacnet.ObjectId): number[] {
    if (objectId.type === OBJECT_TYPE.DEVICE) return DEVICE_PROPERTY_IDS;
    const point = this.findPoint(objectId);
    return point ? pointPropertyIds(point) : [PROPERTY_ID.OBJECT_IDENTIFIER];
  }

  private findPoint(objectId: Bacnet.ObjectId): Point | null {
    const kind = kindForObjectType(objectId.type);
    if (!kind) return null;
    const found = this.device.getPoint(kind, objectId.instance);
    return found.ok ? found.value : null;
  }

  private readPropertyValue(objectId: Bacnet.ObjectId, propertyId: number, arrayIndex: number): ReadPropertyResult {
    if (objectId.type === OBJECT_TYPE.DEVICE) {
      return this.readDeviceProperty(objectId.instance, propertyId, arrayIndex);
    }

    const point = this.findPoint(objectId);
    if (!point) {
      return { ok: false, ...bacnetErrorFor('NotFound') };
    }

    const isArrayProperty = propertyId === PROPERTY_ID.PRIORITY_ARRAY || propertyId === PROPERTY_ID.STATE_TEXT;
    if (!isArrayProperty && arrayIndex !== BacnetEnums.ASN1_ARRAY_ALL) return notAnArray();

    switch (propertyId) {
      case PROPERTY_ID.OBJECT_IDENTIFIER:
        return single(APPLICATION_TAG.OBJECTIDENTIFIER, { type: objectId.type, instance: objectId.instance });
      case PROPERTY_ID.OBJECT_NAME:
        return single(APPLICATION_TAG.CHARACTER_STRING, point.name);
      case PROPERTY_ID.OBJECT_TYPE:
        return single(APPLICATION_TAG.ENUMERATED, objectId.type);
      case PROPERTY_ID.DESCRIPTION:
        return single(APPLICATION_TAG.CHARACTER_STRING, point.description);
      case PROPERTY_ID.PRESENT_VALUE:
        return { ok: true, values: [encodePointValue(point, point.effectiveValue)] };
      case PROPERTY_ID.STATUS_FLAGS:
        return single(APPLICATION_TAG.BIT_STRING, bitStringForBits(4, []));
      case PROPERTY_ID.EVENT_STATE:
        return single(APPLICATION_TAG.ENUMERATED, BacnetEnums.EventState.NORMAL);
      case PROPERTY_ID.RELIABILITY:
        return single(APPLICATION_TAG.ENUMERATED, BacnetEnums.Reliability.NO_FAULT_DETECTED);
      case PROPERTY_ID.OUT_OF_SERVICE:
        return single(APPLICATION_TAG.BOOLEAN, false);
      case PROPERTY_ID.UNITS:
        if (point.family !== 'analog') return unknownProperty();
        return single(APPLICATION_TAG.ENUMERATED, ENGINEERING_UNITS[point.units ?? 'noUnits']);
      case PROPERTY_ID.NUMBER_OF_STATES:
        if (point.family !== 'multistate') return unknownProperty();
        return single(APPLICATION_TAG.UNSIGNED_INTEGER, point.stateCount);
      case PROPERTY_ID.STATE_TEXT:
        if (point.family !== 'multistate') return unknownProperty();
        return this.readArray(
          point.stateText.map((text) => ({ type: APPLICATION_TAG.CHARACTER_STRING, value: text })),
          arrayIndex,
        );
      case PROPERTY_ID.PRIORITY_ARRAY: {
        const slots = point.priorityArray();
        if (!slots) return unknownProperty();
        return this.readArray(
          slots.map((slot) => (slot === null
            ? { type: APPLICATION_TAG.NULL, value: null }
            : encodePointValue(point, slot))),
          arrayIndex,
        );
      }
      case PROPERTY_ID.RELINQUISH_DEFAULT:
        if (!point.commandable) return unknownProperty();
        return { ok: true, values: [encodePointValue(point, point.relinquishDefault)] };
      default:
        return unknownProperty();
    }
  }

  private readArray(values: Bacnet.BacnetValue[], arrayIndex: number): ReadPropertyResult {
    if (arrayIndex === BacnetEnums.ASN1_ARRAY_ALL) return { ok: true, values };
    if (arrayIndex === 0) return single(APPLICATION_TAG.UNSIGNED_INTEGER, values.length);
    const entry = arrayIndex > 0 ? values[arrayIndex - 1] : undefined;
    return entry ? { ok: true, values: [entry] } : invalidArrayIndex();
  }

  private buildObjectList(): Bacnet.ObjectId[] {
    const objects: Bacnet.ObjectId[] = [{ type: OBJECT_TYPE.DEVICE, instance: this.device.identity.deviceId }];
    for (const point of this.device.registry.all()) {
      objects.push({ type: OBJECT_TYPE_BY_KIND[point.kind], instance: point.instance });
    }
    return objects;
  }

  private readDeviceProperty(instance: number, propertyId: number, arrayIndex: number): ReadPropertyResult {
    const { identity } = this.device;
    if (instance !== identity.deviceId) {
      return { ok: false, ...bacnetErrorFor('NotFound') };
    }
    if (propertyId !== PROPERTY_ID.OBJECT_LIST && arrayIndex !== BacnetEnums.ASN1_ARRAY_ALL) return notAnArray();

    switch (propertyId) {
      case PROPERTY_ID.OBJECT_IDENTIFIER:
        return single(APPLICATION_TAG.OBJECTIDENTIFIER, { type: OBJECT_TYPE.DEVICE, instance });
      case PROPERTY_ID.OBJECT_NAME:
        return single(APPLICATION_TAG.CHARACTER_STRING, identity.deviceName);
      case PROPERTY_ID.OBJECT_TYPE:
        return single(APPLICATION_TAG.ENUMERATED, OBJECT_TYPE.DEVICE);
      case PROPERTY_ID.DESCRIPTION:
        return single(APPLICATION_TAG.CHARACTER_STRING, identity.description);
      case PROPERTY_ID.SYSTEM_STATUS:
        return single(APPLICATION_TAG.ENUMERATED, BacnetEnums.DeviceStatus.OPERATIONAL);
      case PROPERTY_ID.VENDOR_NAME:
        return single(APPLICATION_TAG.CHARACTER_STRING, identity.vendorName);
      case PROPERTY_ID.VENDOR_IDENTIFIER:
        return single(APPLICATION_TAG.UNSIGNED_INTEGER, identity.vendorId);
      case PROPERTY_ID.MODEL_NAME:
        return single(APPLICATION_TAG.CHARACTER_STRING, identity.modelName);
      case PROPERTY_ID.FIRMWARE_REVISION:
      case PROPERTY_ID.APPLICATION_SOFTWARE_VERSION:
        return single(APPLICATION_TAG.CHARACTER_STRING, identity.firmware);
      case PROPERTY_ID.PROTOCOL_VERSION:
        return single(APPLICATION_TAG.UNSIGNED_INTEGER, 1);
      case PROPERTY_ID.PROTOCOL_REVISION:
        return single(APPLICATION_TAG.UNSIGNED_INTEGER, 14);
      case PROPERTY_ID.PROTOCOL_SERVICES_SUPPORTED: {
        const supported = [
          BacnetEnums.ServicesSupported.I_AM,
          BacnetEnums.ServicesSupported.WHO_IS,
          BacnetEnums.ServicesSupported.READ_PROPERTY,
          BacnetEnums.ServicesSupported.READ_PROPERTY_MULTIPLE,
          BacnetEnums.ServicesSupported.WRITE_PROPERTY,
          BacnetEnums.ServicesSupported.WRITE_PROPERTY_MULTIPLE,
        ];
        return single(APPLICATION_TAG.BIT_STRING, bitStringForBits(Math.max(...supported) + 1, supported));
      }
      case PROPERTY_ID.PROTOCOL_OBJECT_TYPES_SUPPORTED: {
        const supported = [OBJECT_TYPE.DEVICE, ...POINT_KINDS.map((kind) => OBJECT_TYPE_BY_KIND[kind])];
        return single(APPLICATION_TAG.BIT_STRING, bitStringForBits(Math.max(...supported) + 1, supported));
      }
      case PROPERTY_ID.OBJECT_LIST:
        return this.readArray(
          this.buildObjectList().map((objectId) => ({ type: APPLICATION_TAG.OBJECTIDENTIFIER, value: objectId })),
          arrayIndex,
        );
      case PROPERTY_ID.MAX_APDU_LENGTH_ACCEPTED:
        return single(APPLICATION_TAG.UNSIGNED_INTEGER, MAX_APDU_LENGTH);
      case PROPERTY_ID.SEGMENTATION_SUPPORTED:
        return single(APPLICATION_TAG.ENUMERATED, BacnetEnums.Segmentation.NO_SEGMENTATION);
      case PROPERTY_ID.APDU_TIMEOUT:
        return single(APPLICATION_TAG.UNSIGNED_INTEGER, APDU_TIMEOUT_MS);
      case PROPERTY_ID.NUMBER_OF_APDU_RETRIES:
        return single(APPLICATION_TAG.UNSIGNED_INTEGER, 3);
      case PROPERTY_ID.DATABASE_REVISION:
        return single(APPLICATION_TAG.UNSIGNED_INTEGER, 1);
      default:
        return unknownProperty();
    }
  }
}
