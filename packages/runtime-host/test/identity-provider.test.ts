/**
 * xferctl Runtime Host — Identity Provider Client Tests
 *
 *   IDP-U1: authorization URL parameters
 *   IDP-U2: public clients send client_id in the form; confidential clients use basic auth
 *   IDP-U3: expires_in becomes an absolute expiry at exchange time
 *   IDP-U4: malformed or failed token responses
 *   IDP-U5: introspection
 */

import { describe, it, expect } from 'vitest';
import { ProtocolError, RemoteError } from '@xferctl/kernel';
import { IdentityProviderClient, buildAuthorizationUrl } from '../src/auth/identity-provider.js';
import type { ClientConfig } from '../src/config/env.js';
import { FakeTransport, jsonReply } from './fake-transport.js';
import type { FakeHandler } from './fake-transport.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const AUTH_BASE = 'https://idp.example.test/oauth2';
const NOW = new Date('2025-01-01T00:00:00Z');
const PUBLIC_CLIENT: ClientConfig = { clientId: 'xferctl-cli', authBaseUrl: AUTH_BASE };
const CONFIDENTIAL_CLIENT: ClientConfig = { clientId: 'xferctl-cli', clientSecret: 'test-secret', authBaseUrl: AUTH_BASE };

const TOKEN_RESPONSE = {
  access_token: 'test-access',
  refresh_token: 'test-refresh',
  expires_in: 3600,
  scope: 'openid profile',
  resource_server: 'transfer.api.example.test',
};

function idp(config: ClientConfig, handler: FakeHandler) {
  const transport = new FakeTransport(handler);
  return { transport, client: new IdentityProviderClient(config, { transport, now: () => NOW }) };
}

function form(body: string | undefined): Record<string, string> {
  return Object.fromEntries(new URLSearchParams(body ?? ''));
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('IDP-U1: buildAuthorizationUrl', () => {
  it('encodes every authorization parameter', () => {
    expect(
      buildAuthorizationUrl({
        authBaseUrl: AUTH_BASE,
        clientId: 'xferctl-cli',
        redirectUri: 'http://localhost:8080/callback',
        scopes: ['openid', 'profile', 'email'],
        state: 'xferctl-1-abc',
      }),
    ).toBe(
      'https://idp.example.test/oauth2/authorize?client_id=xferctl-cli' +
        '&redirect_uri=http%3A%2F%2Flocalhost%3A8080%2Fcallback' +
        '&scope=openid+profile+email&state=xferctl-1-abc&response_type=code&access_type=offline',
    );
  });
});

describe('IDP-U2: client authentication', () => {
  it('sends client_id in the form for a public client', async () => {
    const { transport, client } = idp(PUBLIC_CLIENT, () => jsonReply(TOKEN_RESPONSE));

    await client.exchangeCode('code-1', 'http://localhost:8080/callback');

    const request = transport.single();
    expect(request.method).toBe('POST');
    expect(request.url).toBe('https://idp.example.test/oauth2/token');
    expect(request.headers['Content-Type']).toBe('application/x-www-form-urlencoded');
    expect('Authorization' in request.headers).toBe(false);
    expect(form(request.body)).toEqual({
      grant_type: 'authorization_code',
      code: 'code-1',
      redirect_uri: 'http://localhost:8080/callback',
      client_id: 'xferctl-cli',
    });
  });

  it('uses basic auth for a confidential client', async () => {
    const { transport, client } = idp(CONFIDENTIAL_CLIENT, () => jsonReply(TOKEN_RESPONSE));

    await client.exchangeCode('code-1', 'http://localhost:8080/callback');

    const request = transport.single();
    expect(request.headers['Authorization']).toBe(
      `Basic ${Buffer.from('xferctl-cli:test-secret').toString('base64')}`,
    );
    expect('client_id' in form(request.body)).toBe(false);
  });

  it('sends a refresh_token grant', async () => {
    const { transport, client } = idp(PUBLIC_CLIENT, () => jsonReply(TOKEN_RESPONSE));

    await client.refresh('test-refresh');

    expect(form(transport.single().body)).toEqual({
      grant_type: 'refresh_token',
      refresh_token: 'test-refresh',
      client_id: 'xferctl-cli',
    });
  });
});

describe('IDP-U3: token bundle', () => {
  it('converts expires_in to an absolute instant and splits scopes', async () => {
    const { client } = idp(PUBLIC_CLIENT, () => jsonReply(TOKEN_RESPONSE));

    const bundle = await client.exchangeCode('code-1', 'http://localhost:8080/callback');

    expect(bundle).toEqual({
      accessCredential: 'test-access',
      refreshCredential: 'test-refresh',
      expiresAt: new Date('2025-01-01T01:00:00Z'),
      scopes: ['openid', 'profile'],
      resourceServer: 'transfer.api.example.test',
    });
  });

  it('leaves optional fields empty when the response omits them', async () => {
    const { client } = idp(PUBLIC_CLIENT, () => jsonReply({ access_token: 'test-access', expires_in: 60 }));

    const bundle = await client.exchangeCode('code-1', 'http://localhost:8080/callback');

    expect(bundle.refreshCredential).toBeUndefined();
    expect(bundle.scopes).toEqual([]);
    expect(bundle.resourceServer).toBe('');
    expect(bundle.expiresAt.toISOString()).toBe('2025-01-01T00:01:00.000Z');
  });
});

describe('IDP-U4: failures', () => {
  it('rejects a response without an access token', async () => {
    const { client } = idp(PUBLIC_CLIENT, () => jsonReply({ expires_in: 60 }));
    await expect(client.exchangeCode('code-1', 'http://localhost:8080/callback')).rejects.toThrow(
      new ProtocolError('Cannot decode token exchange response: unexpected shape.'),
    );
  });

  it('rejects an expires_in beyond the representable date range', async () => {
    const { client } = idp(PUBLIC_CLIENT, () => jsonReply({ ...TOKEN_RESPONSE, expires_in: 1e300 }));
    await expect(client.exchangeCode('code-1', 'http://localhost:8080/callback')).rejects.toThrow(
      new ProtocolError('Cannot decode token exchange response: expires_in 1e+300 is out of range.'),
    );
  });

  it('rejects a body that is not JSON', async () => {
    const { client } = idp(PUBLIC_CLIENT, () => ({ status: 200, body: 'ok' }));
    await expect(client.refresh('test-refresh')).rejects.toThrow(
      'Cannot decode token refresh response: body is not valid JSON.',
    );
  });

  it('reports an HTTP error as RemoteError', async () => {
    const { transport, client } = idp(PUBLIC_CLIENT, () => ({ status: 400, body: '{"error":"invalid_grant"}' }));

    const failure = client.exchangeCode('code-1', 'http://localhost:8080/callback');

    await expect(failure).rejects.toBeInstanceOf(RemoteError);
    await expect(failure).rejects.toThrow('token exchange: HTTP 400: {"error":"invalid_grant"}');
    expect(transport.released).toBe(1);
  });
});

describe('IDP-U5: introspect', () => {
  it('posts the token and maps identity fields', async () => {
    const { transport, client } = idp(PUBLIC_CLIENT, () =>
      jsonReply({ active: true, sub: 'user-1', username: 'alice', email: null }),
    );

    const identity = await client.introspect('test-access');

    expect(transport.single().url).toBe('https://idp.example.test/oauth2/token/introspect');
    expect(form(transport.single().body)).toEqual({ token: 'test-access', client_id: 'xferctl-cli' });
    expect(identity).toEqual({ active: true, subject: 'user-1', username: 'alice' });
  });

  it('rejects a response without an active flag', async () => {
    const { client } = idp(PUBLIC_CLIENT, () => jsonReply({ sub: 'user-1' }));
    await expect(client.introspect('test-access')).rejects.toBeInstanceOf(ProtocolError);
  });
});
