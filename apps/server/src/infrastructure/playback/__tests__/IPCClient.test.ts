/**
 * IPCClient tests against an in-process Unix socket server
 */

import * as fs from 'fs';
import * as net from 'net';
import * as os from 'os';
import * as path from 'path';
import { IPCClient } from '../IPCClient';
import { createSilentLogger } from '../../logging';
import type { MPVEvent } from '../../../domain/playback';

describe('IPCClient', () => {
  let dir: string;
  let socketPath: string;
  let server: net.Server;
  let serverSide: Promise<net.Socket>;
  let received: string[];
  let ipcClient: IPCClient;

  beforeEach(async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ipc-test-'));
    socketPath = path.join(dir, 'mpv.sock');
    received = [];
    let accept: (socket: net.Socket) => void = () => undefined;
    serverSide = new Promise(resolve => {
      accept = resolve;
    });
    server = net.createServer(socket => {
      accept(socket);
      socket.on('data', data => {
        for (const line of data.toString().split('\n').filter(Boolean)) {
          received.push(line);
          const { request_id } = JSON.parse(line);
          socket.write(JSON.stringify({ data: 12.5, error: 'success', request_id }) + '\n');
        }
      });
    });
    await new Promise<void>(resolve => server.listen(socketPath, resolve));
    ipcClient = new IPCClient({ logger: createSilentLogger(), connectAttempts: 2, retryDelayMs: 1 });
  });

  afterEach(async () => {
    await ipcClient.disconnect();
    await new Promise<void>(resolve => server.close(() => resolve()));
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should start disconnected and reject commands', async () => {
    expect(ipcClient.isConnected()).toBe(false);
    await expect(ipcClient.sendCommand({ command: ['get_property', 'time-pos'] })).rejects.toThrow('Not connected to MPV');
  });

  it('should match responses to requests', async () => {
    await ipcClient.connect(socketPath);

    const response = await ipcClient.sendCommand({ command: ['get_property', 'time-pos'] });

    expect(response).toEqual({ data: 12.5, error: 'success', request_id: 1 });
    expect(JSON.parse(received[0])).toEqual({ command: ['get_property', 'time-pos'], request_id: 1 });
  });

  it('should deliver events split across socket writes', async () => {
    await ipcClient.connect(socketPath);
    const events: MPVEvent[] = [];
    const delivered = new Promise<void>(resolve => {
      ipcClient.addEventListener(event => {
        events.push(event);
        resolve();
      });
    });

    const socket = await serverSide;
    socket.write('{"event":"end-f');
    socket.write('ile","reason":"error"}\n');
    await delivered;

    expect(events).toEqual([{ event: 'end-file', name: undefined, data: undefined, reason: 'error' }]);
  });

  it('should give up when the socket never appears', async () => {
    await expect(ipcClient.connect(path.join(dir, 'missing.sock')))
      .rejects.toThrow(`Could not connect to mpv socket ${path.join(dir, 'missing.sock')}`);
  });
});
