import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { MongooseModule } from '@nestjs/mongoose';
import { AppController } from './app.controller';
import { MongoExceptionFilter } from './common/filters/mongo-exception.filter';
import { CyclesModule } from './cycles/cycles.module';
import { PlanProgressModule } from './plan-progress/plan-progress.module';
import { ProfilesModule } from './profiles/profiles.module';
import { TodayModule } from './today/today.module';
import { WorkoutDaysModule } from './workout-days/workout-days.module';
import { WorkoutPlanModule } from './workout-plan/workout-plan.module';

@Module({
  controllers: [AppController],
  imports: [
    ConfigModule.forRoot({ isGlobal: true }),
    MongooseModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService) => ({
        uri: config.get<string>('MONGODB_URI') || 'mongodb://localhost:27017/training-progress',
      }),
    }),
    ProfilesModule,
    WorkoutPlanModule,
    WorkoutDaysModule,
    PlanProgressModule,
    CyclesModule,
    TodayModule,
  ],
  providers: [{ provide: APP_FILTER, useClass: MongoExceptionFilter }],
})
export class AppModule {}
