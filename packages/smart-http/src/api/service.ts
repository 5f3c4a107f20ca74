/**
 * Smart HTTP services and their fixed wire bindings.
 *
 * Smart HTTP uses two requests per operation:
 * 1. GET /info/refs?service=git-upload-pack (or git-receive-pack) - ref discovery
 * 2. POST /git-upload-pack (or git-receive-pack) - pack negotiation and transfer
 */

/**
 * Actions the host engine can ask a subtransport to perform.
 */
export const Service = {
  UploadPackLs: "upload-pack-ls",
  UploadPack: "upload-pack",
  ReceivePackLs: "receive-pack-ls",
  ReceivePack: "receive-pack",
} as const;

export type Service = (typeof Service)[keyof typeof Service];

export type ServiceName = "upload-pack" | "receive-pack";

export type HttpMethod = "GET" | "POST";

/**
 * Wire binding of one service: the document path and method it is served
 * from, and the name its content types are derived from.
 */
export interface ActionBinding {
  readonly service: Service;
  readonly serviceName: ServiceName;
  readonly pathSuffix: string;
  readonly method: HttpMethod;
}

const ACTION_BINDINGS: Readonly<Record<Service, ActionBinding>> = {
  [Service.UploadPackLs]: {
    service: Service.UploadPackLs,
    serviceName: "upload-pack",
    pathSuffix: "/info/refs?service=git-upload-pack",
    method: "GET",
  },
  [Service.UploadPack]: {
    service: Service.UploadPack,
    serviceName: "upload-pack",
    pathSuffix: "/git-upload-pack",
    method: "POST",
  },
  [Service.ReceivePackLs]: {
    service: Service.ReceivePackLs,
    serviceName: "receive-pack",
    pathSuffix: "/info/refs?service=git-receive-pack",
    method: "GET",
  },
  [Service.ReceivePack]: {
    service: Service.ReceivePack,
    serviceName: "receive-pack",
    pathSuffix: "/git-receive-pack",
    method: "POST",
  },
};

export function getActionBinding(service: Service): ActionBinding {
  return ACTION_BINDINGS[service];
}

/**
 * Listing services open the conversation; the data services that follow
 * them reuse their stream on stateful transports.
 */
export function isListingService(service: Service): boolean {
  return service === Service.UploadPackLs || service === Service.ReceivePackLs;
}

export function isService(value: string): value is Service {
  return Object.prototype.hasOwnProperty.call(ACTION_BINDINGS, value);
}

/**
 * Get content types for a service.
 */
export function getContentTypes(serviceName: ServiceName): {
  advertisement: string;
  request: string;
  result: string;
} {
  const prefix = `application/x-git-${serviceName}`;
  return {
    advertisement: `${prefix}-advertisement`,
    request: `${prefix}-request`,
    result: `${prefix}-result`,
  };
}

/**
 * Content type a server must answer with for this binding.
 */
export function getExpectedContentType(binding: ActionBinding): string {
  const types = getContentTypes(binding.serviceName);
  return binding.method === "GET" ? types.advertisement : types.result;
}
