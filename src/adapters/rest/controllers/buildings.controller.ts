import {
  BadRequestException,
  Body,
  Controller,
  Delete,
  Get,
  Logger,
  NotFoundException,
  Param,
  ParseIntPipe,
  Post,
} from '@nestjs/common';
import { BuildingCard, BuildingRegistryService } from '@core/registry';
import { normalizeUid } from '@core/token-identifier';
import { CreateBuildingDto } from '../dto/building.dto';

function parseUid(raw: string): string {
  const uid = normalizeUid(raw);
  if (!uid) {
    throw new BadRequestException(`Invalid card UID: ${raw}`);
  }
  return uid;
}

function checkBuildingType(type: number): number {
  if (type < 0 || type > 255) {
    throw new BadRequestException('Building type must be between 0 and 255');
  }
  return type;
}

/**
 * Query and manage the building registry
 */
@Controller('buildings')
export class BuildingsController {
  private readonly logger = new Logger(BuildingsController.name);

  constructor(private readonly registry: BuildingRegistryService) {}

  /**
   * All registered cards
   * GET /api/v1/buildings
   */
  @Get()
  list() {
    const buildings = this.registry.snapshot();
    return {
      total: buildings.length,
      buildings,
      timestamp: new Date().toISOString(),
    };
  }

  /**
   * Card count per building type
   * GET /api/v1/buildings/stats
   */
  @Get('stats')
  stats() {
    const byType: Record<string, number> = {};
    for (const card of this.registry.snapshot()) {
      byType[card.buildingType] = (byType[card.buildingType] ?? 0) + 1;
    }
    return {
      total: this.registry.size(),
      byType,
      timestamp: new Date().toISOString(),
    };
  }

  /**
   * GET /api/v1/buildings/types/:type
   */
  @Get('types/:type')
  byType(@Param('type', ParseIntPipe) type: number) {
    const buildingType = checkBuildingType(type);
    const buildings: BuildingCard[] = Array.from(this.registry.allOfType(buildingType).values());
    return {
      buildingType,
      present: buildings.length > 0,
      count: buildings.length,
      buildings,
    };
  }

  /**
   * GET /api/v1/buildings/:uid
   */
  @Get(':uid')
  findOne(@Param('uid') rawUid: string): BuildingCard {
    const uid = parseUid(rawUid);
    const card = this.registry.get(uid);
    if (!card) {
      throw new NotFoundException(`Building ${uid} is not registered`);
    }
    return card;
  }

  /**
   * Register a card by hand
   * POST /api/v1/buildings
   * Body: { uid: string, buildingType: number }
   */
  @Post()
  create(@Body() body: CreateBuildingDto) {
    const uid = parseUid(body.uid);
    const inserted = this.registry.add(uid, body.buildingType);

    this.logger.log(`${inserted ? '✅ Registered' : 'ℹ️  Already registered'}: ${uid}`);

    return {
      inserted,
      building: this.registry.get(uid) ?? null,
      timestamp: new Date().toISOString(),
    };
  }

  /**
   * DELETE /api/v1/buildings/:uid
   */
  @Delete(':uid')
  remove(@Param('uid') rawUid: string) {
    const uid = parseUid(rawUid);
    return {
      uid,
      removed: this.registry.remove(uid),
      timestamp: new Date().toISOString(),
    };
  }

  /**
   * DELETE /api/v1/buildings
   */
  @Delete()
  clear() {
    const cleared = this.registry.size();
    this.registry.clear();
    return {
      cleared,
      timestamp: new Date().toISOString(),
    };
  }
}
