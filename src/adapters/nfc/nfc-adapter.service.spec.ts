import { ConfigModule } from '@infra/config';
import { encodeClassificationMessage } from '@core/ndef';
import { BuildingRegistryService } from '@core/registry';
import { BufferTagSession, ScanOrchestratorService, TagReader, TagSession } from '@core/scan';
import { NfcAdapterService } from './nfc-adapter.service';

describe('NfcAdapterService', () => {
  const config = ConfigModule.validate({ MODE: 'NFC', NFC_POLLING_INTERVAL: '250' });
  let registry: BuildingRegistryService;
  let orchestrator: ScanOrchestratorService;
  let detect: jest.Mock<Promise<TagSession | null>, []>;
  let reader: TagReader;
  let adapter: NfcAdapterService;

  beforeEach(() => {
    registry = new BuildingRegistryService(() => 0);
    orchestrator = new ScanOrchestratorService(registry);
    detect = jest.fn(async (): Promise<TagSession | null> => null);
    reader = { detect };
    adapter = new NfcAdapterService(orchestrator, config, reader);
  });

  afterEach(() => {
    adapter.stopReader();
    jest.useRealTimers();
  });

  it('processes a detected card', async () => {
    detect.mockResolvedValueOnce(
      new BufferTagSession(Buffer.from([0x04, 0xa1, 0xb2, 0xc3]), encodeClassificationMessage(5)),
    );

    await expect(adapter.pollOnce()).resolves.toEqual({
      action: 'added',
      uid: '04A1B2C3',
      buildingType: 5,
      source: 'ndef',
    });
    expect(registry.countByType(5)).toBe(1);
    expect(adapter.getStatus()).toMatchObject({ scans: 1, lastScan: { action: 'added' } });
  });

  it('returns null when no card is present', async () => {
    await expect(adapter.pollOnce()).resolves.toBeNull();
    expect(adapter.getStatus().scans).toBe(0);
  });

  it('survives a reader error', async () => {
    detect.mockRejectedValueOnce(new Error('reader unplugged'));

    await expect(adapter.pollOnce()).resolves.toBeNull();
    await expect(adapter.pollOnce()).resolves.toBeNull();
    expect(detect).toHaveBeenCalledTimes(2);
  });

  it('runs one poll at a time', async () => {
    let finishDetect: (session: TagSession | null) => void = () => undefined;
    detect.mockImplementationOnce(
      () => new Promise<TagSession | null>((resolve) => (finishDetect = resolve)),
    );

    const first = adapter.pollOnce();
    await expect(adapter.pollOnce()).resolves.toBeNull();

    finishDetect(null);
    await expect(first).resolves.toBeNull();
    expect(detect).toHaveBeenCalledTimes(1);
  });

  it('polls on the configured interval until stopped', () => {
    jest.useFakeTimers();

    expect(adapter.startReader()).toBe(true);
    expect(adapter.getStatus().isPolling).toBe(true);

    jest.advanceTimersByTime(250);
    expect(detect).toHaveBeenCalledTimes(1);

    adapter.stopReader();
    jest.advanceTimersByTime(1000);
    expect(detect).toHaveBeenCalledTimes(1);
    expect(adapter.getStatus().isPolling).toBe(false);
  });

  it('does not poll without a reader', async () => {
    const idle = new NfcAdapterService(orchestrator, config);

    expect(idle.startReader()).toBe(false);
    await expect(idle.pollOnce()).resolves.toBeNull();
    expect(idle.getStatus()).toMatchObject({ readerConfigured: false, isPolling: false });
  });
});
