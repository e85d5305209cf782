import { decideFromReply } from '../filterDecision';

const MARKER = 'not worthwhile';

describe('decideFromReply', () => {
  it('reads a structured reply', () => {
    expect(decideFromReply('{"worth": true, "reason": "major release"}', MARKER)).toEqual({
      worth: true,
      reason: 'major release',
      structured: true
    });
  });

  it('unwraps a fenced JSON reply', () => {
    const reply = '```json\n{"worth": false, "reason": "advert"}\n```';

    expect(decideFromReply(reply, MARKER)).toEqual({ worth: false, reason: 'advert', structured: true });
  });

  it('treats a missing worth field as not worth reading', () => {
    expect(decideFromReply('{"reason": "unclear"}', MARKER)).toEqual({
      worth: false,
      reason: 'unclear',
      structured: true
    });
  });

  describe('keyword fallback', () => {
    it('accepts free text without a rejection keyword', () => {
      expect(decideFromReply('Worth reading: a solid deep dive.', MARKER)).toEqual({
        worth: true,
        reason: '',
        structured: false
      });
    });

    it('rejects on the configured marker, ignoring case', () => {
      expect(decideFromReply('Verdict: SKIP IT', 'skip').worth).toBe(false);
    });

    it('rejects on the default marker', () => {
      expect(decideFromReply('This article is Not Worthwhile.', MARKER).worth).toBe(false);
    });

    it('rejects a plain no', () => {
      expect(decideFromReply('No.', MARKER).worth).toBe(false);
    });

    it('falls back when the JSON has the wrong shape', () => {
      expect(decideFromReply('{"worth": "yes"}', MARKER)).toEqual({ worth: true, reason: '', structured: false });
    });

    it('ignores an empty marker', () => {
      expect(decideFromReply('yes', '  ').worth).toBe(true);
    });
  });
});
