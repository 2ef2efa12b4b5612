/**
 * HttpTransferGateway Unit Tests
 *
 * Tests for HttpTransferGateway including:
 * - Transfer creation and outcome classification
 * - 401 refresh-and-retry
 * - Timeouts and network errors
 * - Transfer listing, lookup and read retries
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { HttpTransferGateway } from '../../../src/packages/adapters/billing/HttpTransferGateway.js';
import { TokenCache } from '../../../src/packages/adapters/billing/TokenCache.js';
import type { TransferRequest } from '../../../src/packages/core/ports/ITransferGateway.js';

vi.mock('../../../src/utils/logger.js', () => ({
  logger: {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

const BASE_URL = 'https://transfers.test/api/v4';
const TOKEN_URL = 'https://transfers.test/oauth/token';

const transfer: TransferRequest = {
  sourceAccount: 'acme',
  destinationAccount: 'fulfillment-hq',
  amountCents: 1500,
  memo: 'Fulfillment // 3 Items // ref:disb_test',
};

function mockResponse(status: number, body: unknown) {
  return {
    ok: status >= 200 && status < 300,
    status,
    json: async () => body,
    text: async () => (typeof body === 'string' ? body : JSON.stringify(body)),
  };
}

describe('HttpTransferGateway', () => {
  let tokens: TokenCache;
  let gateway: HttpTransferGateway;
  let fetchMock: ReturnType<typeof vi.fn>;

  function createGateway(timeoutMs = 5000): HttpTransferGateway {
    return new HttpTransferGateway(
      {
        baseUrl: `${BASE_URL}/`,
        timeoutMs,
        retryBaseDelayMs: 1,
        credentials: {
          tokenUrl: TOKEN_URL,
          clientId: 'test-client',
          clientSecret: 'test-secret',
        },
      },
      tokens,
    );
  }

  beforeEach(() => {
    tokens = new TokenCache({ accessToken: 'test-access-token', refreshToken: 'test-refresh-token' });
    gateway = createGateway();

    fetchMock = vi.fn();
    global.fetch = fetchMock;
  });

  afterEach(() => {
    vi.clearAllMocks();
  });

  // ===========================================================================
  // createTransfer
  // ===========================================================================

  describe('createTransfer', () => {
    it('should post the transfer and return its id', async () => {
      fetchMock.mockResolvedValueOnce(mockResponse(201, { id: 'tx_abc' }));

      const outcome = await gateway.createTransfer(transfer);

      expect(outcome).toEqual({ outcome: 'success', transferId: 'tx_abc' });
      expect(fetchMock).toHaveBeenCalledWith(
        `${BASE_URL}/organizations/acme/transfers`,
        expect.objectContaining({
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            Authorization: 'Bearer test-access-token',
          },
        })
      );
      expect(JSON.parse(fetchMock.mock.calls[0][1].body)).toEqual({
        to_organization_id: 'fulfillment-hq',
        amount_cents: 1500,
        name: 'Fulfillment // 3 Items // ref:disb_test',
      });
    });

    it('should accept a numeric transfer id', async () => {
      fetchMock.mockResolvedValueOnce(mockResponse(200, { id: 42 }));

      const outcome = await gateway.createTransfer(transfer);

      expect(outcome).toEqual({ outcome: 'success', transferId: '42' });
    });

    it('should classify 404 as permanent', async () => {
      fetchMock.mockResolvedValueOnce(mockResponse(404, 'not found'));

      const outcome = await gateway.createTransfer(transfer);

      expect(outcome).toEqual({
        outcome: 'permanent',
        error: 'Organization not found: acme',
        statusCode: 404,
      });
    });

    it('should classify 403 as permanent', async () => {
      fetchMock.mockResolvedValueOnce(mockResponse(403, 'forbidden'));

      const outcome = await gateway.createTransfer(transfer);

      expect(outcome).toEqual({
        outcome: 'permanent',
        error: 'Not authorized to create transfer from this organization',
        statusCode: 403,
      });
    });

    it('should classify 400 as permanent with the response text', async () => {
      fetchMock.mockResolvedValueOnce(mockResponse(400, 'amount_cents must be positive'));

      const outcome = await gateway.createTransfer(transfer);

      expect(outcome).toEqual({
        outcome: 'permanent',
        error: 'Transfer API error: status 400 - amount_cents must be positive',
        statusCode: 400,
      });
    });

    it('should classify 500 as transient and not resend', async () => {
      fetchMock.mockResolvedValueOnce(mockResponse(500, 'internal error'));

      const outcome = await gateway.createTransfer(transfer);

      expect(outcome).toEqual({
        outcome: 'transient',
        error: 'Transfer API error: status 500 - internal error',
        statusCode: 500,
      });
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('should classify network errors as transient without a status', async () => {
      fetchMock.mockRejectedValueOnce(new Error('ECONNRESET'));

      const outcome = await gateway.createTransfer(transfer);

      expect(outcome).toEqual({
        outcome: 'transient',
        error: 'Failed to connect to transfer API: ECONNRESET',
      });
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('should report an accepted transfer without an id as success', async () => {
      fetchMock.mockResolvedValueOnce(mockResponse(201, { status: 'accepted' }));

      const outcome = await gateway.createTransfer(transfer);

      expect(outcome).toEqual({ outcome: 'success', transferId: null });
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('should report an accepted transfer with a non-JSON body as success', async () => {
      fetchMock.mockResolvedValueOnce({
        ok: true,
        status: 200,
        json: async () => { throw new SyntaxError('Unexpected token < in JSON at position 0'); },
        text: async () => '<html>ok</html>',
      });

      const outcome = await gateway.createTransfer(transfer);

      expect(outcome).toEqual({ outcome: 'success', transferId: null });
    });

    it('should classify a timeout as transient', async () => {
      gateway = createGateway(10);
      fetchMock.mockImplementationOnce((_url: string, init: RequestInit) =>
        new Promise((_resolve, reject) => {
          init.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
        })
      );

      const outcome = await gateway.createTransfer(transfer);

      expect(outcome).toEqual({ outcome: 'transient', error: 'Transfer API timeout' });
    });

    it('should encode the source account in the path', async () => {
      fetchMock.mockResolvedValueOnce(mockResponse(201, { id: 'tx_1' }));

      await gateway.createTransfer({ ...transfer, sourceAccount: 'acme labs' });

      expect(fetchMock.mock.calls[0][0]).toBe(`${BASE_URL}/organizations/acme%20labs/transfers`);
    });
  });

  // ===========================================================================
  // Token refresh
  // ===========================================================================

  describe('token refresh', () => {
    it('should refresh on 401 and resend with the new token', async () => {
      fetchMock
        .mockResolvedValueOnce(mockResponse(401, 'unauthorized'))
        .mockResolvedValueOnce(mockResponse(200, { access_token: 'fresh-token', refresh_token: 'rotated-refresh' }))
        .mockResolvedValueOnce(mockResponse(201, { id: 'tx_9' }));

      const outcome = await gateway.createTransfer(transfer);

      expect(outcome).toEqual({ outcome: 'success', transferId: 'tx_9' });
      expect(fetchMock).toHaveBeenCalledTimes(3);
      expect(fetchMock.mock.calls[1][0]).toBe(TOKEN_URL);
      expect(fetchMock.mock.calls[1][1].body).toContain('grant_type=refresh_token');
      expect(fetchMock.mock.calls[2][1].headers.Authorization).toBe('Bearer fresh-token');
      expect(tokens.accessToken).toBe('fresh-token');
      expect(tokens.refreshToken).toBe('rotated-refresh');
    });

    it('should treat a failed refresh as transient', async () => {
      fetchMock
        .mockResolvedValueOnce(mockResponse(401, 'unauthorized'))
        .mockResolvedValueOnce(mockResponse(400, 'invalid_grant'));

      const outcome = await gateway.createTransfer(transfer);

      expect(outcome).toEqual({
        outcome: 'transient',
        error: 'Failed to refresh access token: 400',
      });
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it('should not refresh without a refresh token', async () => {
      tokens = new TokenCache({ accessToken: 'test-access-token', refreshToken: '' });
      gateway = createGateway();
      fetchMock.mockResolvedValueOnce(mockResponse(401, 'unauthorized'));

      const outcome = await gateway.createTransfer(transfer);

      expect(outcome).toEqual({
        outcome: 'transient',
        error: 'Transfer API error: status 401 - unauthorized',
        statusCode: 401,
      });
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });
  });

  // ===========================================================================
  // listTransfers / findTransferByReference
  // ===========================================================================

  describe('listTransfers', () => {
    it('should map memo or name into the summary', async () => {
      fetchMock.mockResolvedValueOnce(mockResponse(200, [
        { id: 'tx_1', memo: 'ref:disb_a', amount_cents: 100 },
        { id: 2, name: 'ref:disb_b', amount_cents: 200 },
        { id: 'tx_3' },
      ]));

      const transfers = await gateway.listTransfers('acme', 25);

      expect(transfers).toEqual([
        { id: 'tx_1', memo: 'ref:disb_a', amountCents: 100 },
        { id: '2', memo: 'ref:disb_b', amountCents: 200 },
        { id: 'tx_3', memo: '', amountCents: 0 },
      ]);
      expect(fetchMock.mock.calls[0][0]).toBe(`${BASE_URL}/organizations/acme/transfers?per_page=25`);
      expect(fetchMock.mock.calls[0][1].method).toBe('GET');
    });

    it('should retry on network errors', async () => {
      fetchMock
        .mockRejectedValueOnce(new Error('ECONNRESET'))
        .mockRejectedValueOnce(new Error('ECONNRESET'))
        .mockResolvedValueOnce(mockResponse(200, []));

      const transfers = await gateway.listTransfers('acme');

      expect(transfers).toEqual([]);
      expect(fetchMock).toHaveBeenCalledTimes(3);
    });

    it('should give up after the maximum number of attempts', async () => {
      fetchMock.mockRejectedValue(new Error('ECONNREFUSED'));

      await expect(gateway.listTransfers('acme')).rejects.toThrow(
        'Failed to connect to transfer API: ECONNREFUSED'
      );
      expect(fetchMock).toHaveBeenCalledTimes(3);
    });

    it('should not retry on API errors', async () => {
      fetchMock.mockResolvedValueOnce(mockResponse(500, 'internal error'));

      await expect(gateway.listTransfers('acme')).rejects.toThrow('Transfer API error: status 500');
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });
  });

  describe('findTransferByReference', () => {
    it('should match on reference and amount', async () => {
      fetchMock.mockResolvedValueOnce(mockResponse(200, [
        { id: 'tx_1', memo: 'Fulfillment // 1 Item // ref:disb_x', amount_cents: 999 },
        { id: 'tx_2', memo: 'Fulfillment // 3 Items // ref:disb_x', amount_cents: 1500 },
      ]));

      const match = await gateway.findTransferByReference('acme', 'disb_x', 1500);

      expect(match).toEqual({ id: 'tx_2', memo: 'Fulfillment // 3 Items // ref:disb_x', amountCents: 1500 });
    });

    it('should return null when nothing matches', async () => {
      fetchMock.mockResolvedValueOnce(mockResponse(200, [
        { id: 'tx_1', memo: 'ref:disb_other', amount_cents: 1500 },
      ]));

      const match = await gateway.findTransferByReference('acme', 'disb_x', 1500);

      expect(match).toBeNull();
    });
  });
});
