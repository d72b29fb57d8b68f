import { Airline, AirlineProps } from '@/domain/models';
import { InMemoryAirlineRepository } from './in-memory-airline.repository';

describe('InMemoryAirlineRepository', () => {
  let repository: InMemoryAirlineRepository;

  const createAirline = (overrides: Partial<AirlineProps> = {}): Airline =>
    new Airline({
      id: 'airline-1',
      name: 'Delta Air Lines',
      iataCode: 'DL',
      icaoCode: 'DAL',
      country: 'United States',
      active: true,
      createdAt: new Date('2024-06-01T12:00:00Z'),
      updatedAt: new Date('2024-06-01T12:00:00Z'),
      ...overrides,
    });

  beforeEach(() => {
    repository = new InMemoryAirlineRepository();
  });

  describe('save / findById', () => {
    it('should return the saved airline', async () => {
      await repository.save(createAirline());

      const found = await repository.findById('airline-1');

      expect(found?.toPlainObject()).toEqual(createAirline().toPlainObject());
    });

    it('should return null for an unknown id', async () => {
      expect(await repository.findById('missing')).toBeNull();
    });

    it('should overwrite a record with the same id', async () => {
      await repository.save(createAirline());
      await repository.save(createAirline({ name: 'Delta' }));

      const found = await repository.findById('airline-1');

      expect(found?.name).toBe('Delta');
      expect(await repository.count()).toBe(1);
    });

    it('should hand out copies that do not alias storage', async () => {
      await repository.save(createAirline());

      const first = await repository.findById('airline-1');
      first?.createdAt?.setFullYear(1999);
      const second = await repository.findById('airline-1');

      expect(first).not.toBe(second);
      expect(second?.createdAt).toEqual(new Date('2024-06-01T12:00:00Z'));
    });

    it('should not be affected by later changes to the saved instance dates', async () => {
      const airline = createAirline();
      await repository.save(airline);

      airline.updatedAt?.setFullYear(1999);

      const found = await repository.findById('airline-1');
      expect(found?.updatedAt).toEqual(new Date('2024-06-01T12:00:00Z'));
    });
  });

  describe('findByIataCode / findByIcaoCode', () => {
    beforeEach(async () => {
      await repository.save(createAirline());
      await repository.save(createAirline({ id: 'airline-2', name: 'Lufthansa', iataCode: 'LH', icaoCode: 'DLH' }));
    });

    it('should find by IATA code ignoring case', async () => {
      expect((await repository.findByIataCode('lh'))?.id).toBe('airline-2');
      expect((await repository.findByIataCode('DL'))?.id).toBe('airline-1');
    });

    it('should find by ICAO code ignoring case', async () => {
      expect((await repository.findByIcaoCode('dlh'))?.id).toBe('airline-2');
      expect((await repository.findByIcaoCode('DAL'))?.id).toBe('airline-1');
    });

    it('should keep the two code spaces apart', async () => {
      expect(await repository.findByIataCode('DAL')).toBeNull();
      expect(await repository.findByIcaoCode('DL')).toBeNull();
    });

    it('should return null when no airline holds the code', async () => {
      expect(await repository.findByIataCode('AA')).toBeNull();
      expect(await repository.findByIcaoCode('AAL')).toBeNull();
    });
  });

  describe('findAll / findActive', () => {
    beforeEach(async () => {
      await repository.save(createAirline());
      await repository.save(createAirline({ id: 'airline-2', iataCode: 'LH', icaoCode: 'DLH', active: false }));
      await repository.save(createAirline({ id: 'airline-3', iataCode: 'AF', icaoCode: 'AFR' }));
    });

    it('should return every airline in insertion order', async () => {
      const all = await repository.findAll();

      expect(all.map((a) => a.id)).toEqual(['airline-1', 'airline-2', 'airline-3']);
    });

    it('should return only active airlines', async () => {
      const active = await repository.findActive();

      expect(active.map((a) => a.id)).toEqual(['airline-1', 'airline-3']);
    });

    it('should return empty lists for an empty store', async () => {
      await repository.clear();

      expect(await repository.findAll()).toEqual([]);
      expect(await repository.findActive()).toEqual([]);
    });
  });

  describe('delete', () => {
    it('should return true once and false afterwards', async () => {
      await repository.save(createAirline());

      expect(await repository.delete('airline-1')).toBe(true);
      expect(await repository.delete('airline-1')).toBe(false);
      expect(await repository.findById('airline-1')).toBeNull();
    });

    it('should return false for an unknown id', async () => {
      expect(await repository.delete('missing')).toBe(false);
    });
  });

  describe('clear / count', () => {
    it('should empty the store', async () => {
      await repository.save(createAirline());
      await repository.save(createAirline({ id: 'airline-2', iataCode: 'LH', icaoCode: 'DLH' }));
      expect(await repository.count()).toBe(2);

      await repository.clear();

      expect(await repository.count()).toBe(0);
    });
  });
});
