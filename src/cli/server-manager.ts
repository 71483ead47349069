import { request } from 'node:http';

/**
 * Talks to a running relay over HTTP for the status and stop commands.
 */

export async function isServerRunning(port: number): Promise<boolean> {
  return new Promise((resolve) => {
    const req = request({ host: 'localhost', port, path: '/version', method: 'GET' }, (res) => {
      res.resume();
      resolve(res.statusCode === 200);
    });
    req.on('error', () => resolve(false));
    req.end();
  });
}

export async function getServerVersion(port: number): Promise<string | null> {
  return new Promise((resolve) => {
    const req = request({ host: 'localhost', port, path: '/version', method: 'GET' }, (res) => {
      if (res.statusCode !== 200) {
        res.resume();
        resolve(null);
        return;
      }
      let data = '';
      res.on('data', chunk => data += chunk);
      res.on('end', () => resolve(data.trim()));
    });
    req.on('error', () => resolve(null));
    req.end();
  });
}

export async function shutdownServer(port: number, apiKey?: string): Promise<boolean> {
  return new Promise((resolve) => {
    const headers: Record<string, string> = apiKey ? { authorization: `Bearer ${apiKey}` } : {};
    const req = request({ host: 'localhost', port, path: '/shutdown', method: 'POST', headers }, (res) => {
      res.resume();
      resolve(res.statusCode === 200);
    });
    req.on('error', () => resolve(false));
    req.end();
  });
}
