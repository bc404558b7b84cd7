import { describe, it, expect, vi, beforeEach } from 'vitest';

const listContainersMock = vi.fn();
const listMappingsMock = vi.fn();
const listMountsMock = vi.fn();
const contextFromOptionsMock = vi.fn();

const promptsIntroMock = vi.fn();
const promptsOutroMock = vi.fn();
const promptsWarningMock = vi.fn();
const promptsInfoMock = vi.fn();
const promptsNoteMock = vi.fn();
const printTableMock = vi.fn();

vi.mock('../../src/lib/context.js', () => ({
  contextFromOptions: contextFromOptionsMock,
}));

vi.mock('../../src/ui/index.js', () => ({
  prompts: {
    intro: promptsIntroMock,
    outro: promptsOutroMock,
    log: {
      warning: promptsWarningMock,
      info: promptsInfoMock,
    },
    note: promptsNoteMock,
  },
  printTable: printTableMock,
  formatCount: (n: number, singular: string) => `${n} ${singular}${n === 1 ? '' : 's'}`,
  formatBytes: (n: number) => `${n} B`,
  formatState: (state: string) => state,
  icons: {
    success: '✔',
    bullet: '•',
  },
  colors: {
    bold: (x: string) => x,
    muted: (x: string) => x,
  },
}));

const vaultA = {
  name: 'vaultA',
  path: '/test-home/containers/vaultA.img',
  sizeBytes: 67108864,
  state: 'mounted',
  sealed: false,
};

describe('list command', () => {
  beforeEach(() => {
    vi.resetModules();
    contextFromOptionsMock.mockResolvedValue({
      lifecycle: {
        listContainers: listContainersMock,
        listMappings: listMappingsMock,
        listMounts: listMountsMock,
      },
    });
    listContainersMock.mockResolvedValue([vaultA]);
    listMappingsMock.mockResolvedValue(['vaultA_mapper']);
    listMountsMock.mockResolvedValue([]);
  });

  it('prints a container table in default mode', async () => {
    const { listCommand } = await import('../../src/commands/list.js');

    await listCommand.parseAsync([], { from: 'user' });

    expect(promptsIntroMock).toHaveBeenCalledWith('coffer list');
    expect(printTableMock.mock.calls[0][0]).toEqual([vaultA]);
    expect(promptsOutroMock).toHaveBeenCalledWith('1 container');
  });

  it('prints JSON output when --json is passed', async () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const { listCommand } = await import('../../src/commands/list.js');

    await listCommand.parseAsync(['--json'], { from: 'user' });

    expect(logSpy).toHaveBeenCalledWith(JSON.stringify([vaultA], null, 2));
    expect(promptsIntroMock).not.toHaveBeenCalled();
  });

  it('suggests create when there are no containers', async () => {
    listContainersMock.mockResolvedValue([]);
    const { listCommand } = await import('../../src/commands/list.js');

    await listCommand.parseAsync([], { from: 'user' });

    expect(promptsWarningMock).toHaveBeenCalledWith('No containers found');
    expect(printTableMock).not.toHaveBeenCalled();
  });

  it('lists active managed mappings with --mappings', async () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const { listCommand } = await import('../../src/commands/list.js');

    await listCommand.parseAsync(['--mappings'], { from: 'user' });

    expect(logSpy).toHaveBeenCalledWith('• vaultA_mapper');
    expect(listContainersMock).not.toHaveBeenCalled();
  });

  it('reports when no volumes are mounted', async () => {
    const { listCommand } = await import('../../src/commands/list.js');

    await listCommand.parseAsync(['--mounts'], { from: 'user' });

    expect(promptsInfoMock).toHaveBeenCalledWith('No managed volumes are mounted');
  });
});
