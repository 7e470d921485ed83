import { describe, it, expect } from 'vitest';
import { parseStampText, pushUnique, readChildText, readDateStamp, readNestedText, truncateWinId } from '../fields';
import { childElement, parseXmlDocument } from '../xml';

function element(xml: string): Element {
  const root = parseXmlDocument(xml);
  if (!root) throw new Error('fixture is not well-formed');
  return root;
}

describe('parseStampText', () => {
  it('parses YYYYMMDD HHMMSS', () => {
    const stamp = parseStampText('20240229 235959');
    expect(stamp.status).toBe('ok');
    if (stamp.status !== 'ok') return;
    expect(stamp.value.getFullYear()).toBe(2024);
    expect(stamp.value.getMonth()).toBe(1);
    expect(stamp.value.getDate()).toBe(29);
    expect(stamp.value.getHours()).toBe(23);
    expect(stamp.value.getMinutes()).toBe(59);
    expect(stamp.value.getSeconds()).toBe(59);
  });

  it('rejects impossible calendar values', () => {
    expect(parseStampText('20230229 120000')).toEqual({ status: 'unparsable', raw: '20230229 120000' });
    expect(parseStampText('20240105 240000')).toEqual({ status: 'unparsable', raw: '20240105 240000' });
  });

  it('rejects other layouts', () => {
    expect(parseStampText('2024-01-05 13:45:01').status).toBe('unparsable');
    expect(parseStampText('20240105134501').status).toBe('unparsable');
  });
});

describe('readDateStamp', () => {
  it('combines Date/End and Time/End', () => {
    const node = element('<Inspection><Date><End>20240105</End></Date><Time><End>070809</End></Time></Inspection>');
    const stamp = readDateStamp(node);
    expect(stamp.status).toBe('ok');
    if (stamp.status === 'ok') expect(stamp.value.getMinutes()).toBe(8);
  });

  it('is absent when either part is missing', () => {
    expect(readDateStamp(element('<Inspection><Date><End>20240105</End></Date></Inspection>'))).toEqual({ status: 'absent' });
    expect(readDateStamp(element('<Inspection><Date/><Time><End>070809</End></Time></Inspection>'))).toEqual({ status: 'absent' });
  });
});

describe('readChildText / readNestedText', () => {
  const node = element('<Window><WinID>U5-2</WinID><WinID>U6</WinID><Analysis><Result>3</Result></Analysis><Empty/></Window>');

  it('takes the first matching child', () => {
    expect(readChildText(node, 'WinID')).toBe('U5-2');
  });

  it('defaults to an empty string', () => {
    expect(readChildText(node, 'PCBNumber')).toBe('');
    expect(readChildText(node, 'Empty')).toBe('');
    expect(readNestedText(node, 'Result', 'ErrorDescription')).toBe('');
  });

  it('reads one level down', () => {
    expect(readNestedText(node, 'Analysis', 'Result')).toBe('3');
  });

  it('matches child elements only', () => {
    const analysis = childElement(node, 'Analysis');
    expect(analysis && childElement(analysis, 'WinID')).toBeNull();
  });
});

describe('truncateWinId', () => {
  it('strips the trailing sub-index', () => {
    expect(truncateWinId('U5-2')).toBe('U5');
    expect(truncateWinId('U5')).toBe('U5');
    expect(truncateWinId('R1-2-3')).toBe('R1-2');
  });
});

describe('pushUnique', () => {
  it('keeps insertion order without duplicates', () => {
    const list: string[] = [];
    for (const id of ['C1', 'R2', 'C1', 'U3', 'R2']) pushUnique(list, id);
    expect(list).toEqual(['C1', 'R2', 'U3']);
  });
});

describe('parseXmlDocument', () => {
  it('returns null for text that is not XML', () => {
    expect(parseXmlDocument('<a><b></a>')).toBeNull();
  });

  it('accepts a leading byte order mark', () => {
    expect(parseXmlDocument('\uFEFF<Root/>')?.localName).toBe('Root');
  });
});
