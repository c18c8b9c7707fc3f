import { Controller, Get, Param, ParseIntPipe } from '@nestjs/common';
import { RequireCapability } from '../auth/decorators/require-capability.decorator';
import { MetricsService } from './metrics.service';
import { ReportsService } from './reports.service';

@Controller()
@RequireCapability('report', 'read')
export class MetricsController {
  constructor(
    private metricsService: MetricsService,
    private reportsService: ReportsService,
  ) {}

  @Get('metrics/films/:id')
  async getFilmMetrics(@Param('id', ParseIntPipe) filmId: number) {
    const [profit, roi, sceneCount, totalCrewMinutes, averageCastSalary] = await Promise.all([
      this.metricsService.profit(filmId),
      this.metricsService.roi(filmId),
      this.metricsService.filmSceneCount(filmId),
      this.metricsService.filmTotalCrewMinutes(filmId),
      this.metricsService.filmAverageCastSalary(filmId),
    ]);

    return {
      film_id: filmId,
      profit,
      roi,
      scene_count: sceneCount,
      total_crew_minutes: totalCrewMinutes,
      average_cast_salary: averageCastSalary,
    };
  }

  @Get('metrics/actors/:id/age')
  async getActorAge(@Param('id', ParseIntPipe) actorId: number) {
    return { actor_id: actorId, age: await this.metricsService.actorAge(actorId) };
  }

  @Get('metrics/actors/:id/screen-time/:filmId')
  async getActorScreenTime(
    @Param('id', ParseIntPipe) actorId: number,
    @Param('filmId', ParseIntPipe) filmId: number,
  ) {
    return {
      actor_id: actorId,
      film_id: filmId,
      screen_time: await this.metricsService.actorScreenTime(actorId, filmId),
    };
  }

  @Get('metrics/directors/:id/film-count')
  async getDirectorFilmCount(@Param('id', ParseIntPipe) directorId: number) {
    return { director_id: directorId, film_count: await this.metricsService.directorFilmCount(directorId) };
  }

  @Get('metrics/producers/:id/investment')
  async getProducerInvestment(@Param('id', ParseIntPipe) producerId: number) {
    return {
      producer_id: producerId,
      total_investment: await this.metricsService.producerTotalInvestment(producerId),
    };
  }

  @Get('metrics/equipment/:id/availability')
  async getEquipmentAvailability(@Param('id', ParseIntPipe) equipmentId: number) {
    return {
      equipment_id: equipmentId,
      availability: await this.metricsService.equipmentAvailability(equipmentId),
    };
  }

  @Get('reports/films/profitability')
  async getFilmProfitability() {
    return this.reportsService.filmProfitability();
  }

  @Get('reports/films/box-office')
  async getBoxOfficeAnalysis() {
    return this.reportsService.boxOfficeAnalysis();
  }

  @Get('reports/films/:id/summary')
  async getFilmProductionSummary(@Param('id', ParseIntPipe) filmId: number) {
    return this.reportsService.filmProductionSummary(filmId);
  }

  @Get('reports/films/:id/crew-payroll')
  async getCrewPayroll(@Param('id', ParseIntPipe) filmId: number) {
    return this.reportsService.crewPayroll(filmId);
  }

  @Get('reports/films/:id/equipment-usage')
  async getEquipmentUsage(@Param('id', ParseIntPipe) filmId: number) {
    return this.reportsService.equipmentUsage(filmId);
  }

  @Get('reports/directors/:id/filmography')
  async getDirectorFilmography(@Param('id', ParseIntPipe) directorId: number) {
    return this.reportsService.directorFilmography(directorId);
  }

  @Get('reports/actors/:id/filmography')
  async getActorFilmography(@Param('id', ParseIntPipe) actorId: number) {
    return this.reportsService.actorFilmography(actorId);
  }

  @Get('reports/producers/:id/investment')
  async getProducerInvestmentReport(@Param('id', ParseIntPipe) producerId: number) {
    return this.reportsService.producerInvestment(producerId);
  }

  @Get('reports/distributors/performance')
  async getDistributorPerformance() {
    return this.reportsService.distributorPerformance();
  }
}
