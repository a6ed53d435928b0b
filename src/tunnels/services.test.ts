import { createHash } from 'node:crypto';
import { customDomains, exposeCommand, ngrokCommand } from './services.js';

describe('exposeCommand', () => {
  it('shares the local URL under a time-derived subdomain', () => {
    const now = 1_767_621_807_500;
    const subdomain = createHash('sha1').update('1767621807').digest('hex');

    expect(exposeCommand('http://localhost:8000', now)).toEqual({
      command: 'expose',
      args: ['share', 'http://localhost:8000', `--subdomain=${subdomain}`, '--no-interaction'],
    });
  });

  it('uses the same subdomain within one second', () => {
    expect(exposeCommand('http://localhost', 1_000_100)).toEqual(exposeCommand('http://localhost', 1_000_900));
  });
});

describe('ngrokCommand', () => {
  it('rewrites the Host header', () => {
    expect(ngrokCommand('http://localhost:8000')).toEqual({
      command: 'ngrok',
      args: ['http', 'http://localhost:8000', '--host-header=rewrite'],
    });
  });
});

describe('customDomains', () => {
  it('returns the host of the base URL', () => {
    expect(customDomains('https://hooks.example.test/base')).toEqual(['hooks.example.test']);
  });

  it('falls back to the raw value when it is not a URL', () => {
    expect(customDomains('hooks.example.test')).toEqual(['hooks.example.test']);
  });
});
