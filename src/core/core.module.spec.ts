import { Test, TestingModule } from '@nestjs/testing';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { ConfigModule } from '@infra/config';
import { MessagingService } from '@infra/messaging';
import { CoreModule } from './core.module';
import { encodeClassificationMessage } from './ndef';
import { BuildingRegistryService } from './registry';
import { BufferTagSession, ScanOrchestratorService } from './scan';

describe('CoreModule', () => {
  let moduleRef: TestingModule;

  beforeEach(async () => {
    moduleRef = await Test.createTestingModule({
      imports: [ConfigModule, EventEmitterModule.forRoot(), CoreModule],
    }).compile();
    await moduleRef.init();
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  it('publishes a building added by a scan', async () => {
    const messaging = moduleRef.get(MessagingService);
    const publish = jest.spyOn(messaging, 'publish').mockResolvedValue(true);
    const orchestrator = moduleRef.get(ScanOrchestratorService);

    const result = await orchestrator.processToken(
      new BufferTagSession(Buffer.from([0x04, 0xa1, 0xb2, 0xc3]), encodeClassificationMessage(7)),
    );

    expect(result.action).toBe('added');
    expect(moduleRef.get(BuildingRegistryService).size()).toBe(1);
    expect(publish).toHaveBeenCalledWith('buildings/added', {
      uid: '04A1B2C3',
      buildingType: 7,
      timestamp: expect.any(String),
    });
  });

  it('publishes a building removed by a scan in delete mode', async () => {
    const messaging = moduleRef.get(MessagingService);
    const publish = jest.spyOn(messaging, 'publish').mockResolvedValue(true);
    const registry = moduleRef.get(BuildingRegistryService);
    const orchestrator = moduleRef.get(ScanOrchestratorService);

    registry.add('04A1B2C3', 7);
    publish.mockClear();
    orchestrator.setDeleteMode(true);

    await orchestrator.processToken(new BufferTagSession(Buffer.from([0x04, 0xa1, 0xb2, 0xc3]), null));

    expect(publish).toHaveBeenCalledTimes(1);
    expect(publish).toHaveBeenCalledWith('buildings/removed', {
      uid: '04A1B2C3',
      buildingType: 7,
      timestamp: expect.any(String),
    });
  });
});
