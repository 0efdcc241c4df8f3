import { expect } from 'chai';

import {
  LogFormat,
  LogLevel,
  configureRootLogger,
  getLogFormat,
  rootLogger,
  toPinoLevel,
} from './logging.js';

describe('Logging Utilities', () => {
  describe('toPinoLevel', () => {
    it('passes pino levels through', () => {
      expect(toPinoLevel('debug')).to.equal('debug');
      expect(toPinoLevel('warn')).to.equal('warn');
    });

    it('maps off and none to silent', () => {
      expect(toPinoLevel('off')).to.equal('silent');
      expect(toPinoLevel('none')).to.equal('silent');
    });

    it('returns undefined for unknown or empty levels', () => {
      expect(toPinoLevel('verbose')).to.be.undefined;
      expect(toPinoLevel(undefined)).to.be.undefined;
    });
  });

  describe('configureRootLogger', () => {
    const previousFormat = getLogFormat();
    const previousLevel =
      Object.values(LogLevel).find(
        (level) => toPinoLevel(level) === rootLogger.level,
      ) ?? LogLevel.Off;

    after(() => {
      configureRootLogger(previousFormat, previousLevel);
    });

    it('replaces the exported root logger', () => {
      const logger = configureRootLogger(LogFormat.JSON, LogLevel.Warn);
      expect(logger.level).to.equal('warn');
      expect(rootLogger).to.equal(logger);
      expect(getLogFormat()).to.equal(LogFormat.JSON);
    });

    it('maps off to a silent logger', () => {
      expect(configureRootLogger(LogFormat.JSON, LogLevel.Off).level).to.equal(
        'silent',
      );
    });
  });
});
