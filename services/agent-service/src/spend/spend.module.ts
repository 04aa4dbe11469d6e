import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { DailySpend } from './entities/daily-spend.entity';
import { DailySpendRepository } from './daily-spend.repository';
import { SpendLedgerService } from './spend-ledger.service';
import { SpendController } from './spend.controller';

/**
 * SpendModule
 * Daily spend cap (reserve before each model call, reconcile after)
 * Exposes GET /api/spend/today
 */
@Module({
  imports: [TypeOrmModule.forFeature([DailySpend])],
  controllers: [SpendController],
  providers: [DailySpendRepository, SpendLedgerService],
  exports: [SpendLedgerService],
})
export class SpendModule {}
