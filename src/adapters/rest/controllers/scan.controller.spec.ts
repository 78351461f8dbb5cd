import { BuildingRegistryService } from '@core/registry';
import { ScanOrchestratorService } from '@core/scan';
import { ScanController } from './scan.controller';

describe('ScanController', () => {
  let registry: BuildingRegistryService;
  let controller: ScanController;

  beforeEach(() => {
    registry = new BuildingRegistryService(() => 0);
    controller = new ScanController(new ScanOrchestratorService(registry));
  });

  it('adds, then removes in delete mode', async () => {
    await expect(
      controller.scan({ uid: '04a1b2c3', data: '0305d101014207fe' }),
    ).resolves.toMatchObject({
      action: 'added',
      uid: '04A1B2C3',
      buildingType: 7,
      source: 'ndef',
      deleteMode: false,
    });

    expect(controller.setMode({ deleteMode: true })).toEqual({ deleteMode: true });
    expect(controller.getMode()).toEqual({ deleteMode: true });

    await expect(controller.scan({ uid: '04A1B2C3' })).resolves.toMatchObject({
      action: 'removed',
      uid: '04A1B2C3',
      buildingType: 7,
      deleteMode: true,
    });
    expect(registry.size()).toBe(0);
  });

  it('falls back to the first UID byte without tag data', async () => {
    await expect(controller.scan({ uid: '2a000001' })).resolves.toMatchObject({
      action: 'added',
      uid: '2A000001',
      buildingType: 42,
      source: 'uid',
    });
  });
});
