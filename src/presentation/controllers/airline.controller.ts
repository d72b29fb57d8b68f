import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  NotFoundException,
  Param,
  Post,
  Put,
  Query,
} from '@nestjs/common';
import {
  ApiBadRequestResponse,
  ApiCreatedResponse,
  ApiNoContentResponse,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiParam,
  ApiTags,
} from '@nestjs/swagger';
import {
  AirlineResponseDto,
  CreateAirlineDto,
  ListAirlinesQueryDto,
  UpdateAirlineDto,
} from '@/application/dtos';
import {
  CreateAirlineUseCase,
  DeleteAirlineUseCase,
  GetAirlineUseCase,
  ListAirlinesUseCase,
  UpdateAirlineUseCase,
} from '@/application/use-cases';

const AIRLINE_NOT_FOUND = 'Airline not found';

@Controller('api/v1/airlines')
@ApiTags('airlines')
export class AirlineController {
  constructor(
    private readonly createAirline: CreateAirlineUseCase,
    private readonly getAirline: GetAirlineUseCase,
    private readonly listAirlines: ListAirlinesUseCase,
    private readonly updateAirline: UpdateAirlineUseCase,
    private readonly deleteAirline: DeleteAirlineUseCase,
  ) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Create new airline' })
  @ApiCreatedResponse({
    description: 'Airline created successfully',
    type: AirlineResponseDto,
  })
  @ApiBadRequestResponse({ description: 'Invalid body, or IATA/ICAO code already in use' })
  async create(@Body() dto: CreateAirlineDto): Promise<AirlineResponseDto> {
    const airline = await this.createAirline.execute({
      name: dto.name,
      iataCode: dto.iata_code,
      icaoCode: dto.icao_code,
      country: dto.country,
      active: dto.active,
    });

    return AirlineResponseDto.fromModel(airline);
  }

  @Get()
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'List airlines' })
  @ApiOkResponse({
    description: 'Airline list returned successfully',
    type: [AirlineResponseDto],
  })
  async findAll(@Query() query: ListAirlinesQueryDto): Promise<AirlineResponseDto[]> {
    const airlines = await this.listAirlines.execute(query.active_only ?? false);

    return airlines.map(AirlineResponseDto.fromModel);
  }

  @Get(':id')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Find airline by id' })
  @ApiParam({ name: 'id', description: 'Airline ID' })
  @ApiOkResponse({
    description: 'Airline found',
    type: AirlineResponseDto,
  })
  @ApiNotFoundResponse({ description: AIRLINE_NOT_FOUND })
  async findById(@Param('id') id: string): Promise<AirlineResponseDto> {
    const airline = await this.getAirline.execute(id);

    if (!airline) {
      throw new NotFoundException(AIRLINE_NOT_FOUND);
    }

    return AirlineResponseDto.fromModel(airline);
  }

  @Put(':id')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Update airline name, country or active flag' })
  @ApiParam({ name: 'id', description: 'Airline ID' })
  @ApiOkResponse({
    description: 'Airline updated successfully',
    type: AirlineResponseDto,
  })
  @ApiNotFoundResponse({ description: AIRLINE_NOT_FOUND })
  @ApiBadRequestResponse({ description: 'Invalid body' })
  async update(@Param('id') id: string, @Body() dto: UpdateAirlineDto): Promise<AirlineResponseDto> {
    const airline = await this.updateAirline.execute(id, {
      name: dto.name,
      country: dto.country,
      active: dto.active,
    });

    if (!airline) {
      throw new NotFoundException(AIRLINE_NOT_FOUND);
    }

    return AirlineResponseDto.fromModel(airline);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Remove airline' })
  @ApiParam({ name: 'id', description: 'Airline ID' })
  @ApiNoContentResponse({ description: 'Airline removed successfully' })
  @ApiNotFoundResponse({ description: AIRLINE_NOT_FOUND })
  async remove(@Param('id') id: string): Promise<void> {
    const deleted = await this.deleteAirline.execute(id);

    if (!deleted) {
      throw new NotFoundException(AIRLINE_NOT_FOUND);
    }
  }
}
