import axios, {isAxiosError, type AxiosInstance} from 'axios'
import {RequestFailedError, type RequestFailureReason} from '../errors.js'
import {err, ok, type Result} from '../result.js'
import type {Manifest} from '../types.js'
import {validationResponseSchema} from './schemas.js'
import {errorMessage} from './utils.js'

export const defaultValidationUrl = 'https://api.up42.com/validate-schema/block'

/** What the platform said about a manifest. */
export type RemoteVerdict = {
  valid: boolean;
  errors: string[];
}

/**
 * Remote manifest validation, as offered by the platform.
 */
export type ManifestValidationClient = {
  validate(manifest: Manifest): Promise<Result<RemoteVerdict, RequestFailedError>>;
}

export type HttpValidationClientOptions = {
  url?: string;
  timeoutMs?: number;
  /** Preconfigured axios instance (adapters, proxies, interceptors). */
  http?: AxiosInstance;
}

const connectionCodes = new Set(['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'EAI_AGAIN', 'EHOSTUNREACH', 'ENETUNREACH', 'ERR_NETWORK'])
const timeoutCodes = new Set(['ECONNABORTED', 'ETIMEDOUT', 'ERR_CANCELED'])

/**
 * Sort a failed request into http / connection / timeout / other.
 */
export function classifyRequestError(error: unknown): RequestFailedError {
  if (!isAxiosError(error)) {
    return new RequestFailedError('other', errorMessage(error), undefined, {cause: error})
  }

  if (error.response) {
    const {status, statusText} = error.response
    return new RequestFailedError('http', `${status} ${statusText}`.trim(), status, {cause: error})
  }

  let reason: RequestFailureReason = 'other'
  if (error.code && timeoutCodes.has(error.code)) {
    reason = 'timeout'
  } else if (error.code && connectionCodes.has(error.code)) {
    reason = 'connection'
  }

  return new RequestFailedError(reason, error.message, undefined, {cause: error})
}

/**
 * Posts manifests to the platform validation endpoint with axios.
 */
export class HttpValidationClient implements ManifestValidationClient {
  readonly url: string
  private readonly timeoutMs: number | undefined
  private readonly http: AxiosInstance

  constructor(options: HttpValidationClientOptions = {}) {
    this.url = options.url ?? defaultValidationUrl
    this.timeoutMs = options.timeoutMs
    this.http = options.http ?? axios.create()
  }

  async validate(manifest: Manifest): Promise<Result<RemoteVerdict, RequestFailedError>> {
    let body: unknown
    try {
      const response = await this.http.post<unknown>(this.url, JSON.stringify(manifest), {
        headers: {'Content-Type': 'application/json'},
        responseType: 'json',
        timeout: this.timeoutMs
      })
      body = response.data
    } catch (error: unknown) {
      return err(classifyRequestError(error))
    }

    const parsed = validationResponseSchema.safeParse(body)
    if (!parsed.success) {
      return err(new RequestFailedError('other', 'unexpected response from the validation endpoint', undefined, {cause: parsed.error}))
    }

    const {valid, errors = []} = parsed.data.data
    return ok({valid, errors: errors.map(entry => typeof entry === 'string' ? entry : JSON.stringify(entry))})
  }
}
