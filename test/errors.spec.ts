import { expect } from 'chai';

import {
  ConnectionError,
  NotConnectedError,
  ScpiLinkError,
  TimeoutError,
  TransportError,
} from '../src';

describe('errors', function () {
  it('should append the endpoint to the message', function () {
    const error = new NotConnectedError('link is disconnected', '192.0.2.10:2288');
    expect(error.message).to.equal('link is disconnected (192.0.2.10:2288)');
    expect(error.endpoint).to.equal('192.0.2.10:2288');
    expect(error.name).to.equal('NotConnectedError');
    expect(error).to.be.instanceOf(ScpiLinkError);
    expect(error).to.be.instanceOf(Error);
  });

  it('should describe the timed out command', function () {
    const error = new TimeoutError('*IDN?', 500, '192.0.2.10:2288');
    expect(error.message).to.equal(
      'no response to "*IDN?" within 500ms (192.0.2.10:2288)',
    );
    expect(error.command).to.equal('*IDN?');
    expect(error.timeout).to.equal(500);
    expect(error.name).to.equal('TimeoutError');
  });

  it('should keep the socket error as cause', function () {
    const socketError = new Error('connect ECONNREFUSED 192.0.2.10:2288');
    const error = new ConnectionError('failed to connect', '192.0.2.10:2288', {
      cause: socketError,
    });
    expect(error.cause).to.equal(socketError);
    expect(error.name).to.equal('ConnectionError');
    expect(new TransportError('write failed', 'x:1')).to.be.instanceOf(
      ScpiLinkError,
    );
  });
});
