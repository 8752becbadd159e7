import { expect } from 'chai';
import log from 'loglevel';
import sinon from 'sinon';

import { InstrumentLink, LOGGER_NAME, createLogger } from '../src';

describe('createLogger()', function () {
  afterEach(function () {
    log.getLogger(LOGGER_NAME).setLevel('warn');
  });

  it('should return the named loglevel logger by default', function () {
    expect(createLogger()).to.equal(log.getLogger(LOGGER_NAME));
  });

  it('should set the level of the named loglevel logger', function () {
    createLogger({ level: 'silent' });
    expect(log.getLogger(LOGGER_NAME).getLevel()).to.equal(log.levels.SILENT);
  });

  it('should use an injected logger and leave the shared level alone', function () {
    const logger = {
      debug: sinon.spy(),
      info: sinon.spy(),
      warn: sinon.spy(),
      error: sinon.spy(),
    };
    log.getLogger(LOGGER_NAME).setLevel('warn');

    const combined = createLogger({ logger, level: 'silent' });
    combined.debug('[%s] debug', 'a');
    combined.error('error', { code: 2 });

    expect(combined).to.equal(logger);
    expect(log.getLogger(LOGGER_NAME).getLevel()).to.equal(log.levels.WARN);
    sinon.assert.calledOnceWithExactly(logger.debug, '[%s] debug', 'a');
    sinon.assert.calledOnceWithExactly(logger.error, 'error', { code: 2 });
  });

  it('should not change the shared level for a link with its own logger', function () {
    const logger = {
      debug: sinon.spy(),
      info: sinon.spy(),
      warn: sinon.spy(),
      error: sinon.spy(),
    };
    log.getLogger(LOGGER_NAME).setLevel('warn');

    const link = new InstrumentLink({
      host: '127.0.0.1',
      port: 2288,
      logger,
      logLevel: 'silent',
    });

    expect(link.log).to.equal(logger);
    expect(log.getLogger(LOGGER_NAME).getLevel()).to.equal(log.levels.WARN);
  });
});
