// bacstack ships no type declarations; this covers the server-side surface used here.
declare module 'bacstack' {
  namespace Bacnet {
    type EnumGroup = Readonly<Record<string, number>>;

    interface BacnetEnum {
      ObjectType: EnumGroup;
      PropertyIdentifier: EnumGroup;
      ApplicationTags: EnumGroup;
      ErrorClass: EnumGroup;
      ErrorCode: EnumGroup;
      EngineeringUnits: EnumGroup;
      Segmentation: EnumGroup;
      ConfirmedServiceChoice: EnumGroup;
      ServicesSupported: EnumGroup;
      DeviceStatus: EnumGroup;
      Reliability: EnumGroup;
      EventState: EnumGroup;
      ASN1_ARRAY_ALL: number;
      ASN1_NO_PRIORITY: number;
    }

    interface ClientOptions {
      port?: number;
      interface?: string;
      apduTimeout?: number;
      apduSize?: number;
    }

    interface ObjectId {
      type: number;
      instance: number;
    }

    interface PropertyRef {
      id: number;
      index?: number;
    }

    interface BacnetValue {
      type: number;
      value: unknown;
    }

    interface ReadAccessSpecification {
      objectId: ObjectId;
      properties: PropertyRef[];
    }

    interface ReadAccessResult {
      objectId: ObjectId;
      values: Array<{ property: PropertyRef; value: BacnetValue[] }>;
    }

    interface PropertyWrite {
      property?: PropertyRef;
      value?: BacnetValue[];
      priority?: number;
    }

    interface WhoIsRequest {
      address?: string;
      lowLimit?: number;
      highLimit?: number;
    }

    interface ConfirmedRequest<T> {
      address: string;
      invokeId: number;
      request?: T;
    }

    type ReadPropertyRequest = ConfirmedRequest<{ objectId?: ObjectId; property?: PropertyRef }>;
    type ReadPropertyMultipleRequest = ConfirmedRequest<{ properties?: ReadAccessSpecification[] }>;
    type WritePropertyRequest = ConfirmedRequest<{ objectId?: ObjectId; value?: PropertyWrite }>;
    type WritePropertyMultipleRequest = ConfirmedRequest<{ objectId?: ObjectId; values?: PropertyWrite[] }>;
  }

  class Bacnet {
    static enum: Bacnet.BacnetEnum;

    constructor(options?: Bacnet.ClientOptions);

    on(event: 'error', listener: (error: Error) => void): this;
    on(event: 'whoIs', listener: (request: Bacnet.WhoIsRequest) => void): this;
    on(event: 'readProperty', listener: (request: Bacnet.ReadPropertyRequest) => void): this;
    on(event: 'readPropertyMultiple', listener: (request: Bacnet.ReadPropertyMultipleRequest) => void): this;
    on(event: 'writeProperty', listener: (request: Bacnet.WritePropertyRequest) => void): this;
    on(event: 'writePropertyMultiple', listener: (request: Bacnet.WritePropertyMultipleRequest) => void): this;

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

  export = Bacnet;
}
