import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

// Mock ofetch with FetchError
vi.mock('ofetch', () => {
  class FetchError extends Error {
    statusCode?: number;
    status?: number;
    data?: unknown;

    constructor(message: string) {
      super(message);
      this.name = 'FetchError';
    }
  }

  return {
    ofetch: vi.fn(),
    FetchError,
  };
});

import { ofetch } from 'ofetch';
import { AuthService, TOKEN_ENDPOINT, REQUEST_TIMEOUT_MS, formatPacificTime } from '../../src/services/auth.js';
import { AuthenticationError } from '../../src/lib/errors.js';
import { httpError, tokenResponse } from '../helpers/yelp-fixtures.js';

describe('AuthService', () => {
  let authService: AuthService;
  let now: number;
  const mockClientId = 'test-client-id';
  const mockClientSecret = 'test-client-secret';

  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, 'error').mockImplementation(() => {});
    now = 1_700_000_000_000;
    authService = new AuthService(mockClientId, mockClientSecret, { now: () => now });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('getToken', () => {
    it('should request new token when no cached token', async () => {
      vi.mocked(ofetch).mockResolvedValueOnce(tokenResponse('new-token-123'));

      const token = await authService.getToken();

      expect(token).toBe('new-token-123');
      expect(ofetch).toHaveBeenCalledTimes(1);
      expect(ofetch).toHaveBeenCalledWith(
        TOKEN_ENDPOINT,
        expect.objectContaining({ method: 'POST' })
      );
    });

    it('should send credentials as form data', async () => {
      vi.mocked(ofetch).mockResolvedValueOnce(tokenResponse());

      await authService.getToken();

      expect(ofetch).toHaveBeenCalledWith(
        'https://api.yelp.com/oauth2/token',
        expect.objectContaining({
          method: 'POST',
          headers: {
            'Content-Type': 'application/x-www-form-urlencoded',
          },
        })
      );

      const body = vi.mocked(ofetch).mock.calls[0][1]?.body;
      expect(body).toBe(
        'grant_type=client_credentials&client_id=test-client-id&client_secret=test-client-secret'
      );
    });

    it('should bound the token request by the request timeout', async () => {
      vi.mocked(ofetch).mockResolvedValueOnce(tokenResponse());

      await authService.getToken();

      expect(REQUEST_TIMEOUT_MS).toBe(30_000);
      expect(ofetch).toHaveBeenCalledWith(
        TOKEN_ENDPOINT,
        expect.objectContaining({ method: 'POST', timeout: 30_000 })
      );
    });

    it('should return cached token while before expiry', async () => {
      vi.mocked(ofetch).mockResolvedValueOnce(tokenResponse('cached-token', 3600));

      expect(await authService.getToken()).toBe('cached-token');

      // 到期前 1ms
      now += 3600 * 1000 - 1;
      expect(await authService.getToken()).toBe('cached-token');

      expect(ofetch).toHaveBeenCalledTimes(1);
    });

    it('should refresh exactly once when the token reaches its expiry', async () => {
      vi.mocked(ofetch)
        .mockResolvedValueOnce(tokenResponse('first-token', 60))
        .mockResolvedValueOnce(tokenResponse('second-token', 3600));

      expect(await authService.getToken()).toBe('first-token');

      // 剛好等於到期時間即視為過期
      now += 60 * 1000;
      expect(await authService.getToken()).toBe('second-token');
      expect(await authService.getToken()).toBe('second-token');

      expect(ofetch).toHaveBeenCalledTimes(2);
    });

    it('should share one in-flight request between concurrent callers', async () => {
      let resolveToken: (value: unknown) => void = () => {};
      vi.mocked(ofetch).mockReturnValueOnce(
        new Promise((resolve) => {
          resolveToken = resolve;
        })
      );

      const first = authService.getToken();
      const second = authService.getToken();
      expect(authService.hasInflightRequest()).toBe(true);

      resolveToken(tokenResponse('shared-token'));

      await expect(Promise.all([first, second])).resolves.toEqual(['shared-token', 'shared-token']);
      expect(ofetch).toHaveBeenCalledTimes(1);
      expect(authService.hasInflightRequest()).toBe(false);
    });

    it('should throw AuthenticationError with status on rejected credentials', async () => {
      vi.mocked(ofetch).mockRejectedValueOnce(httpError(401, { error: 'invalid_client' }));

      const error = await authService.getToken().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AuthenticationError);
      expect(error).toMatchObject({
        code: 'AUTH_ERROR',
        statusCode: 401,
        message: 'Token request rejected with status 401',
      });
      expect(authService.isTokenValid()).toBe(false);
    });

    it('should throw AuthenticationError on network failure', async () => {
      vi.mocked(ofetch).mockRejectedValueOnce(new Error('socket hang up'));

      await expect(authService.getToken()).rejects.toThrow('Token request failed: socket hang up');
    });

    it('should throw AuthenticationError on malformed token body', async () => {
      vi.mocked(ofetch).mockResolvedValueOnce({ token_type: 'Bearer' });

      await expect(authService.getToken()).rejects.toBeInstanceOf(AuthenticationError);
    });

    it('should reject a non-numeric expires_in', async () => {
      vi.mocked(ofetch).mockResolvedValueOnce({ access_token: 'abc', expires_in: '3600' });

      await expect(authService.getToken()).rejects.toThrow(
        'Token response is missing access_token or expires_in'
      );
    });

    it('should not retry after a failed refresh', async () => {
      vi.mocked(ofetch).mockRejectedValueOnce(httpError(500));

      await expect(authService.getToken()).rejects.toBeInstanceOf(AuthenticationError);
      expect(ofetch).toHaveBeenCalledTimes(1);
      expect(authService.hasInflightRequest()).toBe(false);
    });
  });

  describe('getCachedToken', () => {
    it('should return null before the first refresh', () => {
      expect(authService.getCachedToken()).toBeNull();
    });

    it('should expose the absolute expiry', async () => {
      vi.mocked(ofetch).mockResolvedValueOnce(tokenResponse('valid-token', 86400));

      await authService.getToken();

      const cached = authService.getCachedToken();
      expect(cached?.accessToken).toBe('valid-token');
      expect(cached?.expiresAt).toBe(1_700_000_000_000 + 86400 * 1000);
      expect(cached?.expiresAtPacific).toBe(formatPacificTime(1_700_000_000_000 + 86400 * 1000));
    });
  });

  describe('formatPacificTime', () => {
    it('should render the instant in Pacific time', () => {
      // 2024-01-15T08:00:00Z = 2024-01-15 00:00 PST
      const formatted = formatPacificTime(Date.UTC(2024, 0, 15, 8, 0, 0));

      expect(formatted).toContain('01/15/2024');
      expect(formatted).toContain('00:00:00');
      expect(formatted).toContain('PST');
    });
  });

  describe('clearCache', () => {
    it('should force a refresh on the next call', async () => {
      vi.mocked(ofetch).mockResolvedValue(tokenResponse('cached-token'));

      await authService.getToken();
      authService.clearCache();
      await authService.getToken();

      expect(ofetch).toHaveBeenCalledTimes(2);
    });
  });

  describe('isTokenValid', () => {
    it('should return false when no token', () => {
      expect(authService.isTokenValid()).toBe(false);
    });

    it('should return true when token is valid', async () => {
      vi.mocked(ofetch).mockResolvedValueOnce(tokenResponse('valid-token'));

      await authService.getToken();
      expect(authService.isTokenValid()).toBe(true);
    });
  });
});
