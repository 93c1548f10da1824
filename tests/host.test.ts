import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  discoverLocalIPv4Addresses,
  formatEndpoint,
  resolveRedirectBase,
} from '../src/host.js';

describe('discoverLocalIPv4Addresses', () => {
  it('keeps external IPv4 addresses only', () => {
    const addresses = discoverLocalIPv4Addresses({
      lo: [
        {
          address: '127.0.0.1',
          netmask: '255.0.0.0',
          family: 'IPv4',
          mac: '00:00:00:00:00:00',
          internal: true,
          cidr: '127.0.0.1/8',
        },
      ],
      eth0: [
        {
          address: '192.168.1.20',
          netmask: '255.255.255.0',
          family: 'IPv4',
          mac: '02:00:00:00:00:01',
          internal: false,
          cidr: '192.168.1.20/24',
        },
        {
          address: 'fe80::1',
          netmask: 'ffff:ffff:ffff:ffff::',
          family: 'IPv6',
          mac: '02:00:00:00:00:01',
          internal: false,
          cidr: 'fe80::1/64',
          scopeid: 2,
        },
      ],
    });

    assert.deepEqual(addresses, ['192.168.1.20']);
  });
});

describe('formatEndpoint', () => {
  it('joins address and port', () => {
    assert.equal(formatEndpoint('10.0.0.5', 8080), '10.0.0.5:8080');
  });

  it('brackets IPv6 addresses', () => {
    assert.equal(formatEndpoint('::1', 80), '[::1]:80');
  });

  it('unwraps IPv4-mapped IPv6 addresses', () => {
    assert.equal(formatEndpoint('::ffff:127.0.0.1', undefined), '127.0.0.1');
  });
});

describe('resolveRedirectBase', () => {
  it('uses the request host when no public address is configured', () => {
    assert.equal(
      resolveRedirectBase('', '192.168.1.20:80'),
      'http://192.168.1.20:80'
    );
  });

  it('prefers a configured public address', () => {
    assert.equal(
      resolveRedirectBase('1.2.3.4', '192.168.1.20:80'),
      'http://1.2.3.4'
    );
  });
});
