import {
  BadRequestException,
  Body,
  Controller,
  Delete,
  Get,
  Inject,
  Param,
  Patch,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import { ProfileId } from '../common/decorators/profile-id.decorator';
import { ProfileGuard } from '../common/guards/profile.guard';
import { isProgramDay } from '../common/utils/program-day';
import { ProfilesService } from '../profiles/profiles.service';
import { Clock, CLOCK } from '../progression/clock';
import { expectTransition } from '../progression/transition-errors';
import { CyclesService } from './cycles.service';
import {
  ActivateCycleDto,
  AddCyclePlanDto,
  CreateCycleDto,
  CycleCompletionDto,
  MoveCycleItemDto,
  RenameCycleDto,
} from './dto/cycle.dto';

@Controller('cycles')
@UseGuards(ProfileGuard)
export class CyclesController {
  constructor(
    private readonly cyclesService: CyclesService,
    private readonly profilesService: ProfilesService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  @Get()
  list(@ProfileId() profileId: string) {
    return this.cyclesService.list(profileId);
  }

  @Post()
  create(@ProfileId() profileId: string, @Body() body: CreateCycleDto) {
    return this.cyclesService.create(profileId, body);
  }

  @Get(':cycleId')
  get(@ProfileId() profileId: string, @Param('cycleId') cycleId: string) {
    return this.cyclesService.get(profileId, cycleId);
  }

  @Patch(':cycleId')
  rename(@ProfileId() profileId: string, @Param('cycleId') cycleId: string, @Body() body: RenameCycleDto) {
    return this.cyclesService.rename(profileId, cycleId, body.name);
  }

  @Delete(':cycleId')
  async remove(@ProfileId() profileId: string, @Param('cycleId') cycleId: string) {
    await this.cyclesService.delete(profileId, cycleId);
    return { success: true };
  }

  @Post(':cycleId/activate')
  activate(@ProfileId() profileId: string, @Param('cycleId') cycleId: string, @Body() body: ActivateCycleDto) {
    const hasStart = body.startItemIndex !== undefined || body.startDayIndex !== undefined;
    const start = hasStart ? { itemIndex: body.startItemIndex ?? 0, dayIndex: body.startDayIndex ?? 0 } : undefined;
    return this.cyclesService.activate(profileId, cycleId, start);
  }

  @Post(':cycleId/deactivate')
  deactivate(@ProfileId() profileId: string, @Param('cycleId') cycleId: string) {
    return this.cyclesService.deactivate(profileId, cycleId);
  }

  @Post(':cycleId/items')
  addPlan(@ProfileId() profileId: string, @Param('cycleId') cycleId: string, @Body() body: AddCyclePlanDto) {
    return this.cyclesService.addPlan(profileId, cycleId, body.planId, body.note);
  }

  @Delete(':cycleId/items/:itemId')
  removeItem(@ProfileId() profileId: string, @Param('cycleId') cycleId: string, @Param('itemId') itemId: string) {
    return this.cyclesService.removeItem(profileId, cycleId, itemId);
  }

  @Post(':cycleId/items/move')
  moveItem(@ProfileId() profileId: string, @Param('cycleId') cycleId: string, @Body() body: MoveCycleItemDto) {
    return this.cyclesService.moveItem(profileId, cycleId, body.from, body.to);
  }

  @Post(':cycleId/items/reindex')
  reindexItems(@ProfileId() profileId: string, @Param('cycleId') cycleId: string) {
    return this.cyclesService.reindexItems(profileId, cycleId);
  }

  @Post(':cycleId/reset')
  reset(@ProfileId() profileId: string, @Param('cycleId') cycleId: string) {
    return this.cyclesService.resetProgress(profileId, cycleId);
  }

  @Post(':cycleId/advance')
  async advance(@ProfileId() profileId: string, @Param('cycleId') cycleId: string) {
    return expectTransition(await this.cyclesService.advance(profileId, cycleId));
  }

  @Post(':cycleId/completions')
  async recordCompletion(
    @ProfileId() profileId: string,
    @Param('cycleId') cycleId: string,
    @Body() body: CycleCompletionDto,
  ) {
    if (!isProgramDay(body.date)) throw new BadRequestException('date must be a valid yyyy-MM-dd day');
    return expectTransition(await this.cyclesService.recordCompletion(profileId, cycleId, body.date));
  }

  @Get(':cycleId/state')
  state(@ProfileId() profileId: string, @Param('cycleId') cycleId: string) {
    return this.cyclesService.currentState(profileId, cycleId);
  }

  @Get(':cycleId/preview')
  async preview(@ProfileId() profileId: string, @Param('cycleId') cycleId: string, @Query('date') date?: string) {
    const { today } = await this.profilesService.resolveToday(profileId, this.clock.now());
    const target = date ?? today;
    if (!isProgramDay(target)) throw new BadRequestException('date must be a valid yyyy-MM-dd day');
    const preview = await this.cyclesService.preview(profileId, cycleId, today, target);
    return preview ?? { date: target, planId: null, dayIndex: null, totalDays: 0, dayName: null };
  }
}
