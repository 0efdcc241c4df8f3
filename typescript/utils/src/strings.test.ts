import { expect } from 'chai';

import { ensure0x, errorToString, strip0x } from './strings.js';

describe('String Utilities', () => {
  it('should trim error messages to the specified length', () => {
    expect(errorToString(new Error('Hello, World!'), 5)).to.equal('Hello...');
    expect(errorToString('  Short  ', 10)).to.equal('Short');
    expect(errorToString('', 10)).to.equal('Unknown Error');
  });

  it('should convert errors to strings', () => {
    expect(errorToString(new Error('Test error'))).to.equal('Test error');
    expect(errorToString('Test error')).to.equal('Test error');
    expect(errorToString(404)).to.equal('Error code: 404');
    expect(errorToString({ reason: 'nope' })).to.equal('{"reason":"nope"}');
    expect(errorToString(null)).to.equal('Unknown Error');
  });

  it('should add and remove hex prefixes', () => {
    expect(ensure0x('abcd')).to.equal('0xabcd');
    expect(ensure0x('0xabcd')).to.equal('0xabcd');
    expect(strip0x('0xabcd')).to.equal('abcd');
    expect(strip0x('abcd')).to.equal('abcd');
  });
});
