/**
 * Web service invocation client.
 *
 * ## Usage
 *
 * ```typescript
 * import { createWebServiceProxy, fileAttachment } from '@rest-invoke/web-service-proxy';
 *
 * const proxy = createWebServiceProxy({ serverUrl: 'https://api.example.com/service/' });
 *
 * proxy.encoding = 'multipart';
 * const invocation = proxy.invoke(
 *   { method: 'POST', path: 'upload', arguments: { title: 'report', attachments: [fileAttachment('./report.pdf')] } },
 *   (result, error) => console.log(result, error),
 * );
 *
 * invocation.cancel();
 * ```
 */

export * from './types';
export { WebServiceProxy } from './WebServiceProxy';
export { createWebServiceProxy, createWebServiceProxyFromEnv, ConsoleLogger } from './factories';
export { loadProxyConfigFromEnv, type ProxyEnv } from './config';
export { FileRef, fileAttachment, bytesAttachment, type ByteSource } from './arguments';
export {
  encodeQuery,
  encodeQueryComponent,
  encodeFormBody,
  encodeMultipartBody,
  createMultipartBoundary,
} from './encoding';
export { buildRequest, resolveUrl, mergeHeaders, type BuildRequestOptions } from './request';
export { classify, classifyResponse, reasonPhrase, normalizeHeaders } from './classify';
export { jsonDecoder, schemaDecoder, textDecoder, bytesDecoder } from './decoders';
export { epochMillisDate, stringifyJson, encodeJson, parseJson, APPLICATION_JSON } from './json';
export { createSerialExecutionContext, immediateExecutionContext, ResultDispatcher } from './dispatch';
export * from './errors';
export * from './transport/fetchTransport';
export * from './transport/axiosTransport';
