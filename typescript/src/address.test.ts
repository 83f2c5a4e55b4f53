import { describe, it, expect } from 'vitest';
import { socketAddress, parseIpv4, parseIpv6, formatIpv6 } from './address';
import type { SocketAddress, SocketAddressV4, SocketAddressV6 } from './address';
import { concatBytes } from './codec';
import { BufferUnderflowError, EncodeError, UnknownAddressTagError } from './errors';

const v4: SocketAddressV4 = { family: 'ipv4', address: '127.0.0.1', port: 8080 };
const v6: SocketAddressV6 = {
  family: 'ipv6',
  address: '::1',
  port: 19132,
  flowInfo: 0,
  scopeId: 0,
};

describe('socketAddress', () => {
  describe('IPv4', () => {
    it('encodes tag, octets and port', () => {
      expect(socketAddress.parse(v4)).toEqual(new Uint8Array([4, 127, 0, 0, 1, 0x1f, 0x90]));
    });

    it('roundtrips', () => {
      const cursor = { position: 0 };
      expect(socketAddress.compose(socketAddress.parse(v4), cursor)).toEqual(v4);
      expect(cursor.position).toBe(7);
    });

    it('rejects a truncated address', () => {
      expect(() => socketAddress.compose(new Uint8Array([4, 127, 0]), { position: 0 })).toThrow(
        'Buffer underflow: needed 7 bytes, only 3 available'
      );
    });
  });

  describe('IPv6', () => {
    it('encodes tag, reserved field, port, flow, address and scope', () => {
      const loopback = new Uint8Array(16);
      loopback[15] = 1;
      const expected = concatBytes([
        new Uint8Array([6, 0, 0, 0x4a, 0xbc, 0, 0, 0, 0]),
        loopback,
        new Uint8Array([0, 0, 0, 0]),
      ]);
      expect(socketAddress.parse(v6)).toEqual(expected);
      expect(expected.length).toBe(29);
    });

    it('roundtrips flow info and scope id', () => {
      const address: SocketAddress = {
        family: 'ipv6',
        address: 'fe80::1:2',
        port: 443,
        flowInfo: 5,
        scopeId: 3,
      };
      expect(socketAddress.compose(socketAddress.parse(address), { position: 0 })).toEqual(address);
    });

    it('decodes into canonical text', () => {
      const address: SocketAddress = {
        family: 'ipv6',
        address: '2001:0DB8:0000:0000:0000:0000:0000:0001',
        port: 1,
        flowInfo: 0,
        scopeId: 0,
      };
      const decoded = socketAddress.compose(socketAddress.parse(address), { position: 0 });
      expect(decoded.address).toBe('2001:db8::1');
    });

    it('ignores the reserved field', () => {
      const data = socketAddress.parse(v6);
      data[1] = 0xff;
      data[2] = 0xff;
      expect(socketAddress.compose(data, { position: 0 })).toEqual(v6);
    });
  });

  it('decodes consecutive addresses through a shared cursor', () => {
    const data = concatBytes([socketAddress.parse(v6), socketAddress.parse(v4)]);
    const cursor = { position: 0 };
    expect(socketAddress.compose(data, cursor)).toEqual(v6);
    expect(cursor.position).toBe(29);
    expect(socketAddress.compose(data, cursor)).toEqual(v4);
    expect(cursor.position).toBe(36);
  });

  it('rejects an unknown tag without moving the cursor', () => {
    const cursor = { position: 0 };
    const data = new Uint8Array([5, 127, 0, 0, 1, 0, 80]);
    expect(() => socketAddress.compose(data, cursor)).toThrow(UnknownAddressTagError);
    expect(() => socketAddress.compose(data, cursor)).toThrow('Unknown address tag: 5');
    expect(cursor.position).toBe(0);
  });

  it('rejects invalid values on encode', () => {
    expect(() => socketAddress.parse({ ...v4, address: '256.0.0.1' })).toThrow(EncodeError);
    expect(() => socketAddress.parse({ ...v4, port: 70000 })).toThrow(EncodeError);
    expect(() => socketAddress.parse({ ...v6, address: 'fe80::1%eth0' })).toThrow(EncodeError);
    expect(() => socketAddress.parse({ ...v6, flowInfo: -1 })).toThrow(EncodeError);
  });

  it('rejects an empty source', () => {
    expect(() => socketAddress.compose(new Uint8Array([]), { position: 0 })).toThrow(
      BufferUnderflowError
    );
  });
});

describe('address text', () => {
  it('parses IPv4 octets', () => {
    expect(parseIpv4('10.0.255.1')).toEqual(new Uint8Array([10, 0, 255, 1]));
  });

  it('parses IPv6 with an embedded IPv4 tail', () => {
    const expected = new Uint8Array(16);
    expected.set([0xff, 0xff, 192, 168, 0, 1], 10);
    expect(parseIpv6('::ffff:192.168.0.1')).toEqual(expected);
  });

  it('parses a trailing compression', () => {
    const expected = new Uint8Array(16);
    expected.set([0xfe, 0x80], 0);
    expect(parseIpv6('fe80::')).toEqual(expected);
  });

  it('compresses the first longest zero run', () => {
    const bytes = new Uint8Array([0, 1, 0, 0, 0, 0, 0, 2, 0, 0, 0, 0, 0, 3, 0, 4]);
    expect(formatIpv6(bytes)).toBe('1::2:0:0:3:4');
  });

  it('does not compress a single zero group', () => {
    const bytes = new Uint8Array([0, 1, 0, 0, 0, 2, 0, 3, 0, 4, 0, 5, 0, 6, 0, 7]);
    expect(formatIpv6(bytes)).toBe('1:0:2:3:4:5:6:7');
  });

  it('formats the unspecified address', () => {
    expect(formatIpv6(new Uint8Array(16))).toBe('::');
  });
});
