import { describe, it, expect } from 'vitest';
import {
  createLoopbackCallbackReceiver,
  handleCallbackRequest,
  loopbackAddress,
} from './callback-receiver.js';
import { ConnectionError } from '../errors/errors.js';
import { TEST_REDIRECT_URI } from '../test/fixtures.js';

describe('handleCallbackRequest', () => {
  it('handleCallbackRequest_CodeAndState_RepliesSuccessWithCallback', () => {
    // Act
    const reply = handleCallbackRequest('/callback?code=test-code&state=s1', TEST_REDIRECT_URI);

    // Assert
    expect(reply.status).toBe(200);
    expect(reply.body).toContain('<h1>Login successful</h1>');
    expect(reply.callback).toEqual({ code: 'test-code', state: 's1' });
  });

  it('handleCallbackRequest_ErrorParameter_RepliesFailureWithCallback', () => {
    const reply = handleCallbackRequest(
      '/callback?error=access_denied&error_description=User%20cancelled&state=s1',
      TEST_REDIRECT_URI
    );

    expect(reply.status).toBe(400);
    expect(reply.body).toContain('<h1>Login failed</h1>');
    expect(reply.callback).toEqual({
      state: 's1',
      error: 'access_denied',
      errorDescription: 'User cancelled',
    });
  });

  it('handleCallbackRequest_OtherPath_Replies404WithoutCallback', () => {
    const reply = handleCallbackRequest('/favicon.ico', TEST_REDIRECT_URI);

    expect(reply).toEqual({ status: 404, body: '' });
  });
});

describe('loopbackAddress', () => {
  it('loopbackAddress_Localhost_BindsIpv4Loopback', () => {
    expect(loopbackAddress(TEST_REDIRECT_URI)._unsafeUnwrap()).toEqual({
      host: '127.0.0.1',
      port: 8765,
    });
  });

  it('loopbackAddress_Ipv6Literal_StripsBrackets', () => {
    expect(loopbackAddress('http://[::1]:9000/cb')._unsafeUnwrap()).toEqual({
      host: '::1',
      port: 9000,
    });
  });

  it('loopbackAddress_NoPort_DefaultsTo80', () => {
    expect(loopbackAddress('http://127.0.0.1/cb')._unsafeUnwrap()).toEqual({
      host: '127.0.0.1',
      port: 80,
    });
  });

  it('loopbackAddress_Https_ReturnsConnectionError', () => {
    const error = loopbackAddress('https://localhost/cb')._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(ConnectionError);
    expect(error.message).toBe('Redirect URI "https://localhost/cb" is not a loopback http URI');
  });
});

describe('createLoopbackCallbackReceiver', () => {
  describe('given an aborted signal', () => {
    it('listen_SignalAlreadyAborted_ReturnsConnectionErrorWithoutBinding', async () => {
      // Arrange
      const controller = new AbortController();
      controller.abort();

      // Act
      const result = await createLoopbackCallbackReceiver().listen(TEST_REDIRECT_URI, controller.signal);

      // Assert
      const error = result._unsafeUnwrapErr();
      expect(error).toBeInstanceOf(ConnectionError);
      expect(error.message).toBe('The login callback listener was aborted before it started');
    });

    it('listen_AbortedWhileBinding_ReturnsConnectionErrorInsteadOfListener', async () => {
      // Arrange
      const controller = new AbortController();

      // Act
      const listening = createLoopbackCallbackReceiver().listen('http://127.0.0.1:0/callback', controller.signal);
      controller.abort();
      const result = await listening;

      // Assert
      expect(result._unsafeUnwrapErr().message).toBe(
        'The login callback listener was aborted before it started'
      );
    });
  });
});
