import { ProcessCleanup, registerConnectionCleanup } from '../../../src/utils/processCleanup';

describe('ProcessCleanup', () => {
  let cleanup: ProcessCleanup;
  let once: jest.SpyInstance;

  beforeEach(() => {
    once = jest.spyOn(process, 'once').mockImplementation(() => process);
    cleanup = new ProcessCleanup();
  });

  it('should install the signal handlers once', () => {
    cleanup.registerCleanupHandler(async () => undefined);
    cleanup.registerCleanupHandler(async () => undefined);

    expect(once.mock.calls.map(call => call[0])).toEqual(['SIGTERM', 'SIGINT', 'beforeExit']);
    expect(cleanup.handlerCount()).toBe(2);
  });

  it('should close a registered connection during cleanup', async () => {
    const connection = { close: jest.fn().mockResolvedValue(undefined) };
    registerConnectionCleanup(connection, cleanup);

    const failures = await cleanup.executeCleanup('SIGTERM');

    expect(failures).toBe(0);
    expect(connection.close).toHaveBeenCalledTimes(1);
    expect(cleanup.handlerCount()).toBe(0);
  });

  it('should run every handler even when one fails', async () => {
    const second = jest.fn().mockResolvedValue(undefined);
    cleanup.registerCleanupHandler(() => Promise.reject(new Error('already closed')));
    cleanup.registerCleanupHandler(second);

    const failures = await cleanup.executeCleanup('SIGINT');

    expect(failures).toBe(1);
    expect(second).toHaveBeenCalledTimes(1);
  });

  it('should exit with the cleanup outcome on a signal', async () => {
    const exit = jest.spyOn(process, 'exit').mockImplementation((): never => undefined as never);
    cleanup.registerCleanupHandler(() => Promise.reject(new Error('already closed')));

    await cleanup.handleShutdown('SIGTERM');
    await cleanup.handleShutdown('SIGTERM');

    expect(exit).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(1);
  });

  it('should not exit on beforeExit', async () => {
    const exit = jest.spyOn(process, 'exit').mockImplementation((): never => undefined as never);
    registerConnectionCleanup({ close: jest.fn().mockResolvedValue(undefined) }, cleanup);

    await cleanup.handleShutdown('beforeExit');

    expect(exit).not.toHaveBeenCalled();
  });
});
