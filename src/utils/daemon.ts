import * as crypto from 'crypto';
import * as os from 'os';
import * as path from 'path';

export interface DaemonInfo {
  port: number;
  pid: number;
}

export function getDaemonFilePath(projectRoot: string): string {
  const hash = crypto.createHash('md5').update(projectRoot).digest('hex');
  return path.join(os.tmpdir(), `semhl-daemon-${hash}.json`);
}

export function parseDaemonInfo(content: string): DaemonInfo | null {
  const data: unknown = JSON.parse(content);
  if (typeof data !== 'object' || data === null) {
    return null;
  }
  const port = 'port' in data ? data.port : undefined;
  const pid = 'pid' in data ? data.pid : undefined;
  if (typeof port !== 'number' || typeof pid !== 'number') {
    return null;
  }
  return { port, pid };
}
