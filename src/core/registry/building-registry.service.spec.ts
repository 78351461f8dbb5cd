import { BuildingRegistryService } from './building-registry.service';

describe('BuildingRegistryService', () => {
  let now: number;
  let registry: BuildingRegistryService;
  let onAdded: jest.Mock<void, [number, string]>;
  let onRemoved: jest.Mock<void, [number, string]>;

  beforeEach(() => {
    now = 1000;
    registry = new BuildingRegistryService(() => now);
    onAdded = jest.fn();
    onRemoved = jest.fn();
    registry.setOnAdded(onAdded);
    registry.setOnRemoved(onRemoved);
  });

  describe('add', () => {
    it('inserts a new card and notifies once', () => {
      expect(registry.add('04A1B2C3', 7)).toBe(true);

      expect(onAdded).toHaveBeenCalledTimes(1);
      expect(onAdded).toHaveBeenCalledWith(7, '04A1B2C3');
      expect(registry.size()).toBe(1);
      expect(registry.get('04A1B2C3')).toEqual({
        uid: '04A1B2C3',
        buildingType: 7,
        firstSeen: 1000,
        lastSeen: 1000,
      });
    });

    it('keeps the first building type and refreshes lastSeen on a repeat', () => {
      registry.add('04A1B2C3', 7);
      now = 1500;

      expect(registry.add('04A1B2C3', 9)).toBe(false);

      expect(registry.get('04A1B2C3')).toEqual({
        uid: '04A1B2C3',
        buildingType: 7,
        firstSeen: 1000,
        lastSeen: 1500,
      });
      expect(onAdded).toHaveBeenCalledTimes(1);
    });

    it('never moves lastSeen backwards', () => {
      registry.add('04A1B2C3', 7);
      now = 1500;
      registry.add('04A1B2C3', 7);
      now = 1200;
      registry.add('04A1B2C3', 7);

      expect(registry.get('04A1B2C3')?.lastSeen).toBe(1500);
    });

    it('rejects an empty UID without changing anything', () => {
      expect(registry.add('', 3)).toBe(false);
      expect(registry.size()).toBe(0);
      expect(onAdded).not.toHaveBeenCalled();
    });

    it.each([-1, 256, 2.5])('rejects building type %p', (type) => {
      expect(registry.add('04A1B2C3', type)).toBe(false);
      expect(registry.contains('04A1B2C3')).toBe(false);
    });
  });

  describe('remove', () => {
    it('removes a card and notifies with its building type', () => {
      registry.add('04A1B2C3', 7);

      expect(registry.remove('04A1B2C3')).toBe(true);
      expect(registry.contains('04A1B2C3')).toBe(false);
      expect(onRemoved).toHaveBeenCalledTimes(1);
      expect(onRemoved).toHaveBeenCalledWith(7, '04A1B2C3');
    });

    it('returns false the second time', () => {
      registry.add('04A1B2C3', 7);
      registry.remove('04A1B2C3');

      expect(registry.remove('04A1B2C3')).toBe(false);
      expect(onRemoved).toHaveBeenCalledTimes(1);
    });

    it('returns false for a card never added', () => {
      expect(registry.remove('DEADBEEF')).toBe(false);
      expect(onRemoved).not.toHaveBeenCalled();
    });
  });

  describe('touch', () => {
    it('refreshes lastSeen of a known card only', () => {
      registry.add('04A1B2C3', 7);
      now = 2000;

      expect(registry.touch('04A1B2C3')).toBe(true);
      expect(registry.touch('DEADBEEF')).toBe(false);
      expect(registry.get('04A1B2C3')?.lastSeen).toBe(2000);
      expect(registry.size()).toBe(1);
    });
  });

  describe('queries', () => {
    beforeEach(() => {
      registry.add('01', 3);
      registry.add('02', 3);
      registry.add('03', 5);
    });

    it('counts and finds by building type', () => {
      expect(registry.countByType(3)).toBe(2);
      expect(registry.countByType(4)).toBe(0);
      expect(registry.hasType(5)).toBe(true);
      expect(registry.hasType(4)).toBe(false);
      expect(Array.from(registry.allOfType(3).keys()).sort()).toEqual(['01', '02']);
    });

    it('returns copies that do not write through', () => {
      const card = registry.get('01');
      if (!card) throw new Error('card missing');
      card.buildingType = 99;

      const [first] = registry.snapshot();
      first.lastSeen = -1;

      registry.allEntries().delete('02');
      const byType = registry.allOfType(3).get('01');
      if (byType) byType.firstSeen = -1;

      expect(registry.get('01')).toEqual({ uid: '01', buildingType: 3, firstSeen: 1000, lastSeen: 1000 });
      expect(registry.snapshot().every((c) => c.lastSeen === 1000)).toBe(true);
      expect(registry.contains('02')).toBe(true);
    });

    it('takes a snapshot that later changes do not affect', () => {
      const snapshot = registry.snapshot();
      registry.remove('03');
      registry.add('04', 1);

      expect(snapshot.map((c) => c.uid).sort()).toEqual(['01', '02', '03']);
      expect(registry.allEntries().size).toBe(3);
    });

    it('returns undefined for an unknown UID', () => {
      expect(registry.get('FF')).toBeUndefined();
    });
  });

  describe('clear', () => {
    it('empties the registry without remove notifications', () => {
      registry.add('01', 3);
      registry.add('02', 4);

      registry.clear();

      expect(registry.size()).toBe(0);
      expect(onRemoved).not.toHaveBeenCalled();
    });
  });

  describe('listeners', () => {
    it('sees the committed card and may re-enter the registry', () => {
      const seen: unknown[] = [];
      registry.setOnAdded((_type, uid) => {
        seen.push(registry.get(uid));
        registry.remove(uid);
      });

      expect(registry.add('04A1B2C3', 7)).toBe(true);

      expect(seen).toEqual([{ uid: '04A1B2C3', buildingType: 7, firstSeen: 1000, lastSeen: 1000 }]);
      expect(registry.contains('04A1B2C3')).toBe(false);
      expect(onRemoved).toHaveBeenCalledWith(7, '04A1B2C3');
    });

    it('keeps the change when a listener throws', () => {
      registry.setOnAdded(() => {
        throw new Error('listener failed');
      });

      expect(registry.add('04A1B2C3', 7)).toBe(true);
      expect(registry.contains('04A1B2C3')).toBe(true);
    });

    it('holds one listener per kind', () => {
      const replacement = jest.fn();
      registry.setOnAdded(replacement);
      registry.add('01', 1);

      expect(replacement).toHaveBeenCalledTimes(1);
      expect(onAdded).not.toHaveBeenCalled();

      registry.setOnAdded(undefined);
      registry.add('02', 1);
      expect(replacement).toHaveBeenCalledTimes(1);
    });
  });

  it('uses a monotonic clock by default', () => {
    const defaultRegistry = new BuildingRegistryService();
    defaultRegistry.add('01', 1);
    const card = defaultRegistry.get('01');

    expect(card?.firstSeen).toBe(card?.lastSeen);
    expect(card?.firstSeen).toBeGreaterThanOrEqual(0);
  });
});
