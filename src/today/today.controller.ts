import {
  BadRequestException,
  Body,
  Controller,
  Get,
  Param,
  ParseIntPipe,
  Patch,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import { ProfileId } from '../common/decorators/profile-id.decorator';
import { ProfileGuard } from '../common/guards/profile.guard';
import { isProgramDay } from '../common/utils/program-day';
import { expectTransition } from '../progression/transition-errors';
import { TodayService } from './today.service';
import { ChangeDayDto, LogSetsDto } from './dto/today.dto';

@Controller('today')
@UseGuards(ProfileGuard)
export class TodayController {
  constructor(private readonly todayService: TodayService) {}

  @Get()
  open(@ProfileId() profileId: string) {
    return this.todayService.open(profileId);
  }

  @Get('preview')
  preview(@ProfileId() profileId: string, @Query('date') date?: string) {
    if (date !== undefined && !isProgramDay(date)) {
      throw new BadRequestException('date must be a valid yyyy-MM-dd day');
    }
    return this.todayService.preview(profileId, date);
  }

  @Post('change-day')
  async changeDay(@ProfileId() profileId: string, @Body() body: ChangeDayDto) {
    return expectTransition(
      await this.todayService.changeDay(profileId, body.newDayIndex, body.skipAndAdvance ?? false),
    );
  }

  @Patch('workouts/:date/entries/:entryIndex')
  logSets(
    @ProfileId() profileId: string,
    @Param('date') date: string,
    @Param('entryIndex', ParseIntPipe) entryIndex: number,
    @Body() body: LogSetsDto,
  ) {
    if (!isProgramDay(date)) throw new BadRequestException('date must be a valid yyyy-MM-dd day');
    return this.todayService.logSets(profileId, date, entryIndex, body.completedSetCount);
  }
}
