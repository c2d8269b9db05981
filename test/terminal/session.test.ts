import { beforeEach, describe, expect, it, vi } from 'vitest';

import { SpawnError, TerminalClosedError, TerminalSession } from '../../src/terminal/session.js';
import { FakePty, spawnFakeSession } from '../helpers/fake-pty.js';

const { spawnMock } = vi.hoisted(() => ({ spawnMock: vi.fn() }));

vi.mock('@lydell/node-pty', () => ({ spawn: spawnMock }));

describe('TerminalSession', () => {
  beforeEach(() => {
    spawnMock.mockReset();
  });

  it('spawns the shell on a pseudo-terminal', () => {
    spawnMock.mockReturnValueOnce(new FakePty());

    const session = TerminalSession.spawn({
      shellPath: process.execPath,
      args: ['--login'],
      cwd: '/tmp',
      cols: 100,
      rows: 40,
    });

    expect(session.pid).toBe(4242);
    expect(session.isAlive()).toBe(true);
    expect(session.shellPath).toBe(process.execPath);
    expect(spawnMock).toHaveBeenCalledWith(
      process.execPath,
      ['--login'],
      expect.objectContaining({ cols: 100, rows: 40, cwd: '/tmp', name: 'xterm-256color' }),
    );
  });

  it('fails with SpawnError when the shell is missing', () => {
    expect(() => TerminalSession.spawn({ shellPath: '/nonexistent/shell' })).toThrow(SpawnError);
    expect(spawnMock).not.toHaveBeenCalled();
  });

  it('wraps PTY spawn failures in SpawnError', () => {
    spawnMock.mockImplementationOnce(() => {
      throw new Error('forkpty failed');
    });

    expect(() => TerminalSession.spawn({ shellPath: process.execPath })).toThrow(
      `Failed to spawn "${process.execPath}": forkpty failed`,
    );
  });

  it('buffers output until it is read', async () => {
    const { session, pty } = spawnFakeSession(spawnMock);

    pty.emit('one ');
    pty.emit('two');

    await expect(session.readAvailable(0)).resolves.toBe('one two');
    await expect(session.readAvailable(0)).resolves.toBe('');
  });

  it('waits for output up to the deadline', async () => {
    const { session, pty } = spawnFakeSession(spawnMock);

    setTimeout(() => pty.emit('late'), 20);

    await expect(session.readAvailable(1000)).resolves.toBe('late');
    await expect(session.readAvailable(30)).resolves.toBe('');
  });

  it('notifies data and exit listeners', () => {
    const { session, pty } = spawnFakeSession(spawnMock);
    const onData = vi.fn();
    const onExit = vi.fn();
    const unsubscribe = session.onData(onData);
    session.onExit(onExit);

    pty.emit('a');
    unsubscribe();
    pty.emit('b');
    pty.exit(3);

    expect(onData).toHaveBeenCalledTimes(1);
    expect(onData).toHaveBeenCalledWith('a');
    expect(onExit).toHaveBeenCalledWith({ exitCode: 3, signal: undefined });
    expect(session.isAlive()).toBe(false);
  });

  it('refuses writes after the shell exits', () => {
    const { session, pty } = spawnFakeSession(spawnMock);

    session.write('ls');
    pty.exit(0);

    expect(pty.writes).toEqual(['ls']);
    expect(() => session.write('pwd')).toThrow(TerminalClosedError);
    expect(() => session.resize(80, 24)).toThrow(TerminalClosedError);
  });

  it('resizes and kills the PTY', () => {
    const { session, pty } = spawnFakeSession(spawnMock);

    session.resize(132, 50);
    session.kill();

    expect([pty.cols, pty.rows]).toEqual([132, 50]);
    expect(pty.killed).toBe(true);
    expect(session.isAlive()).toBe(false);
  });
});
