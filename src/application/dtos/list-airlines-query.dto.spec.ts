import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { ListAirlinesQueryDto } from './list-airlines-query.dto';

describe('ListAirlinesQueryDto', () => {
  const parse = (query: Record<string, unknown>) => {
    const dto = plainToInstance(ListAirlinesQueryDto, query);
    return { dto, errors: validateSync(dto) };
  };

  it('should default active_only to false', () => {
    const { dto, errors } = parse({});

    expect(errors).toHaveLength(0);
    expect(dto.active_only).toBe(false);
  });

  it.each([
    ['true', true],
    ['false', false],
    ['True', true],
    ['FALSE', false],
    ['1', true],
    ['0', false],
    ['yes', true],
    ['no', false],
    ['on', true],
    ['off', false],
    ['t', true],
    ['f', false],
    ['Y', true],
    ['n', false],
  ])('should parse "%s" as %s', (raw, expected) => {
    const { dto, errors } = parse({ active_only: raw });

    expect(errors).toHaveLength(0);
    expect(dto.active_only).toBe(expected);
  });

  it.each(['maybe', '2', 'yess', ''])('should reject "%s"', (raw) => {
    const { errors } = parse({ active_only: raw });

    expect(errors).toHaveLength(1);
  });

  it('should reject a non-boolean value', () => {
    const { errors } = parse({ active_only: 'maybe' });

    expect(errors).toHaveLength(1);
    expect(errors[0].constraints).toEqual({ isBoolean: 'active_only must be a boolean' });
  });
});
