import { ApiPropertyOptional } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { IsBoolean, IsOptional } from 'class-validator';

const TRUE_TOKENS = ['1', 'true', 't', 'yes', 'y', 'on'];
const FALSE_TOKENS = ['0', 'false', 'f', 'no', 'n', 'off'];

/** Query strings arrive as text; unrecognised values are left for IsBoolean to reject. */
function parseBooleanFlag(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  const token = value.trim().toLowerCase();
  if (TRUE_TOKENS.includes(token)) return true;
  if (FALSE_TOKENS.includes(token)) return false;
  return value;
}

export class ListAirlinesQueryDto {
  @ApiPropertyOptional({
    description: 'Return only active airlines. Accepts true/false, 1/0, yes/no, on/off, t/f, y/n in any case.',
    example: true,
    default: false,
    type: Boolean,
  })
  @IsOptional()
  @Transform(({ value }) => parseBooleanFlag(value))
  @IsBoolean({ message: 'active_only must be a boolean' })
  active_only?: boolean = false;
}
