import { AxiosError, AxiosHeaders } from 'axios';
import { of, throwError } from 'rxjs';
import { TenantSettingsSchema } from '../../tenants/tenant.schemas';
import { createMockLogger } from '../../test/mocks/pino-logger.mock';
import { HttpChannelSender } from './http.sender';

describe('HttpChannelSender', () => {
  let httpService: { post: jest.Mock };
  let sender: HttpChannelSender;

  beforeEach(() => {
    httpService = { post: jest.fn(() => of({ status: 200, data: {} })) };
    sender = new HttpChannelSender(createMockLogger(), httpService as never);
  });

  test('posts the message with a bearer token', async () => {
    const settings = TenantSettingsSchema.parse({
      provider: 'uazapi',
      outbound: { url: 'http://bridge.local/send', token: 'test-secret' },
    });

    await sender.send({ tenantId: 't1', chatId: 'c1', text: 'Olá!', settings });

    expect(httpService.post).toHaveBeenCalledWith(
      'http://bridge.local/send',
      { provider: 'uazapi', chatId: 'c1', text: 'Olá!' },
      {
        headers: {
          'Content-Type': 'application/json',
          Authorization: 'Bearer test-secret',
        },
        timeout: 10_000,
      },
    );
  });

  test('rejects when the tenant has no outbound URL', async () => {
    const settings = TenantSettingsSchema.parse({});

    await expect(
      sender.send({ tenantId: 't1', chatId: 'c1', text: 'Olá!', settings }),
    ).rejects.toThrow('Tenant "t1" has no outbound URL configured');
    expect(httpService.post).not.toHaveBeenCalled();
  });

  test('reports the HTTP status of a failed send', async () => {
    const settings = TenantSettingsSchema.parse({
      outbound: { url: 'http://bridge.local/send' },
    });
    const error = new AxiosError('Bad Gateway', 'ERR_BAD_RESPONSE', undefined, {}, {
      status: 502,
      statusText: 'Bad Gateway',
      data: {},
      headers: {},
      config: { headers: new AxiosHeaders() },
    });
    httpService.post.mockReturnValue(throwError(() => error));

    await expect(
      sender.send({ tenantId: 't1', chatId: 'c1', text: 'Olá!', settings }),
    ).rejects.toThrow('Outbound send failed with status 502');
  });
});
