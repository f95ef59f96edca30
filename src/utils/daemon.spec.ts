import * as os from 'os';
import * as path from 'path';
import { getDaemonFilePath, parseDaemonInfo } from './daemon';

describe('daemon', () => {
  describe('getDaemonFilePath', () => {
    it('should give each project its own file in the temp directory', () => {
      const first = getDaemonFilePath('/work/a');
      const second = getDaemonFilePath('/work/b');

      expect(path.dirname(first)).toBe(os.tmpdir());
      expect(path.basename(first)).toMatch(/^semhl-daemon-[0-9a-f]{32}\.json$/);
      expect(first).not.toBe(second);
      expect(getDaemonFilePath('/work/a')).toBe(first);
    });
  });

  describe('parseDaemonInfo', () => {
    it('should read the port and pid', () => {
      expect(parseDaemonInfo('{"port":30001,"pid":42}')).toEqual({ port: 30001, pid: 42 });
    });

    it('should return null for incomplete content', () => {
      expect(parseDaemonInfo('{"port":30001}')).toBeNull();
      expect(parseDaemonInfo('{"port":"30001","pid":42}')).toBeNull();
      expect(parseDaemonInfo('null')).toBeNull();
    });

    it('should throw on malformed JSON', () => {
      expect(() => parseDaemonInfo('{port')).toThrow(SyntaxError);
    });
  });
});
