// src/services/__tests__/PlatformSession.test.ts
import { PlatformSession } from '../PlatformSession';
import { RequiredResourceError } from '../../domain/models/errors';
import { FakeHttpClient, silentLogger } from '../../__tests__/fakes';

class FlakyHttpClient extends FakeHttpClient {
  attempts = 0;

  async getText(url: string): Promise<string> {
    this.attempts++;
    if (this.attempts === 1) {
      throw new Error('socket hang up');
    }
    return super.getText(url);
  }
}

describe('PlatformSession', () => {
  const origin = 'https://lms.example.org';

  it('should retry a failed page once', async () => {
    const http = new FlakyHttpClient({ [`${origin}/page`]: { body: '<p>ok</p>' } });
    const session = new PlatformSession(http, `${origin}/`, silentLogger());

    expect(await session.getPage(`${origin}/page`)).toBe('<p>ok</p>');
    expect(http.attempts).toBe(2);
  });

  it('should give up on pages after the last attempt', async () => {
    const http = new FlakyHttpClient();
    const session = new PlatformSession(http, origin, silentLogger(), { maxAttempts: 3 });

    expect(await session.getPage(`${origin}/missing`)).toBeNull();
    expect(http.attempts).toBe(3);
  });

  it('should parse API payloads', async () => {
    const http = new FakeHttpClient({ [`${origin}/api/courses/v1/courses/x`]: { body: '{"name":"Course"}' } });
    const session = new PlatformSession(http, origin, silentLogger());

    expect(await session.getApiJson('/api/courses/v1/courses/x')).toEqual({ name: 'Course' });
  });

  it('should fail on unreachable or invalid API payloads', async () => {
    const http = new FakeHttpClient({ [`${origin}/api/broken`]: { body: '<html>' } });
    const session = new PlatformSession(http, origin, silentLogger());

    await expect(session.getApiJson('/api/missing')).rejects.toThrow(RequiredResourceError);
    await expect(session.getApiJson('/api/broken')).rejects.toThrow(
      `Failed to fetch required API resource (invalid JSON): ${origin}/api/broken`
    );
  });
});
