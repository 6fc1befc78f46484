/**
 * Google Cloud REST transport.
 *
 * Requests carry a bearer token from application-default credentials,
 * obtained through google-auth-library.
 */

import { GoogleAuth } from 'google-auth-library';
import { ExternalServiceError } from '../../domain/errors';
import { CloudTransport } from '../types';
import { FetchFn, fetchJson } from './http';

export const CLOUD_PLATFORM_SCOPE = 'https://www.googleapis.com/auth/cloud-platform';

/** Source of OAuth access tokens for Google APIs. */
export interface AccessTokenProvider {
  getAccessToken(): Promise<string>;
}

/** Token provider backed by application-default credentials. */
export function googleAccessTokenProvider(
  auth: GoogleAuth = new GoogleAuth({ scopes: [CLOUD_PLATFORM_SCOPE] }),
): AccessTokenProvider {
  return {
    async getAccessToken() {
      const token = await auth.getAccessToken();
      if (!token) {
        throw new ExternalServiceError({
          code: 'EXTERNAL.AUTH',
          message: 'Application-default credentials produced no access token',
          transient: false,
          target: 'google-auth',
        });
      }
      return token;
    },
  };
}

export interface GoogleCloudTransportOptions {
  tokens: AccessTokenProvider;
  fetch?: FetchFn;
}

export function createGoogleCloudTransport(options: GoogleCloudTransportOptions): CloudTransport {
  const fetchFn = options.fetch ?? fetch;

  return async function googleCloudTransport(request, signal) {
    const token = await options.tokens.getAccessToken();
    const body = await fetchJson(fetchFn, {
      target: request.operation,
      url: request.url,
      method: request.method,
      headers: { Authorization: `Bearer ${token}` },
      body: request.body,
      signal,
      secrets: [token],
    });
    return { kind: 'cloud', body };
  };
}
