import { expect } from 'chai';

import LineReader from '../src/network/line-reader';

describe('LineReader', function () {
  it('should return undefined until a terminator arrives', function () {
    const reader = new LineReader('\n');
    reader.append(Buffer.from('abc'));
    expect(reader.readLine()).to.be.undefined;
    expect(reader.available).to.equal(3);

    reader.append(Buffer.from('def\n'));
    expect(reader.readLine()).to.equal('abcdef');
    expect(reader.available).to.equal(0);
  });

  it('should keep bytes after the terminator', function () {
    const reader = new LineReader('\n');
    reader.append(Buffer.from('one\ntwo\nthr'));
    expect(reader.readLine()).to.equal('one');
    expect(reader.readLine()).to.equal('two');
    expect(reader.readLine()).to.be.undefined;
    expect(reader.available).to.equal(3);
  });

  it('should find a multi-byte terminator split across chunks', function () {
    const reader = new LineReader('\r\n');
    reader.append(Buffer.from('1.25\r'));
    expect(reader.readLine()).to.be.undefined;
    reader.append(Buffer.from('\n'));
    expect(reader.readLine()).to.equal('1.25');
  });

  it('should leave a lone CR in the line when the terminator is LF', function () {
    const reader = new LineReader('\n');
    reader.append(Buffer.from('ON\r\n'));
    expect(reader.readLine()).to.equal('ON\r');
  });

  it('should return empty lines', function () {
    const reader = new LineReader('\n');
    reader.append(Buffer.from('\n\n'));
    expect(reader.readLine()).to.equal('');
    expect(reader.readLine()).to.equal('');
    expect(reader.readLine()).to.be.undefined;
  });

  it('should decode UTF-8 split across chunks', function () {
    const reader = new LineReader('\n');
    const encoded = Buffer.from('25 °C\n', 'utf8');
    reader.append(encoded.subarray(0, 4));
    reader.append(encoded.subarray(4));
    expect(reader.readLine()).to.equal('25 °C');
  });

  it('should drop buffered bytes on clear()', function () {
    const reader = new LineReader('\n');
    reader.append(Buffer.from('stale\npartial'));
    reader.clear();
    expect(reader.available).to.equal(0);
    expect(reader.readLine()).to.be.undefined;
  });
});
