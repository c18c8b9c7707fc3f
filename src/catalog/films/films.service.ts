import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, FindOptionsWhere, Repository } from 'typeorm';
import { Film, ProductionStatus } from './entities/film.entity';
import { FilmGenre } from './entities/film-genre.entity';
import { FilmCertificate } from './entities/film-certificate.entity';
import { Scene } from './entities/scene.entity';
import { SceneFilming } from './entities/scene-filming.entity';
import { CreateFilmDto } from './dto/create-film.dto';
import { UpdateFilmDto } from './dto/update-film.dto';
import { CreateCertificateDto } from './dto/create-certificate.dto';
import { CreateSceneDto } from './dto/create-scene.dto';
import { CreateSceneFilmingDto } from './dto/create-scene-filming.dto';
import { WriteGuardService } from '../../validation/write-guard.service';
import { AuditService } from '../../audit/audit.service';
import { RecordNotFoundException } from '../../common/exceptions/record-not-found.exception';
import { ValidationException } from '../../common/exceptions/validation.exception';
import { inTransaction } from '../../common/utils/transaction.util';
import { withStoreErrors } from '../../common/utils/store-error.util';

/**
 * Films Service - films and the records that live and die with them
 *
 * Handles:
 * - Film CRUD with the minimum-budget rule on insert and update
 * - Status transitions written to the film audit trail
 * - Genres, certificate, scenes and scene filmings
 */
@Injectable()
export class FilmsService {
  private readonly logger = new Logger(FilmsService.name);

  constructor(
    @InjectRepository(Film)
    private filmRepository: Repository<Film>,
    @InjectRepository(FilmGenre)
    private genreRepository: Repository<FilmGenre>,
    @InjectRepository(FilmCertificate)
    private certificateRepository: Repository<FilmCertificate>,
    @InjectRepository(Scene)
    private sceneRepository: Repository<Scene>,
    @InjectRepository(SceneFilming)
    private filmingRepository: Repository<SceneFilming>,
    private dataSource: DataSource,
    private writeGuard: WriteGuardService,
    private auditService: AuditService,
  ) {}

  async create(dto: CreateFilmDto, manager?: EntityManager): Promise<Film> {
    this.writeGuard.assertFilmInsert(dto);

    return inTransaction(this.dataSource, manager, (tx) =>
      withStoreErrors({ entity: 'Film', key: { title: dto.title } }, () =>
        tx.save(Film, tx.create(Film, { ...dto, production_status: dto.production_status ?? 'Pre-Production' })),
      ),
    );
  }

  async findAll(filters: { production_status?: ProductionStatus; director_id?: number } = {}): Promise<Film[]> {
    const where: FindOptionsWhere<Film> = {};

    if (filters.production_status) {
      where.production_status = filters.production_status;
    }

    if (filters.director_id !== undefined) {
      where.director_id = filters.director_id;
    }

    return this.filmRepository.find({ where, order: { film_id: 'ASC' } });
  }

  async findOne(id: number, manager?: EntityManager): Promise<Film> {
    const repository = manager ? manager.getRepository(Film) : this.filmRepository;
    const film = await repository.findOne({ where: { film_id: id }, relations: { genres: true } });
    if (!film) {
      throw new RecordNotFoundException('Film', id);
    }
    return film;
  }

  /**
   * The budget rule is evaluated against the merged record; a status change is
   * audited in the same transaction as the write.
   */
  async update(id: number, dto: UpdateFilmDto, manager?: EntityManager): Promise<Film> {
    return inTransaction(this.dataSource, manager, async (tx) => {
      const film = await this.findOne(id, tx);
      if (Object.keys(dto).length === 0) {
        return film;
      }
      const before = { ...film };
      const { genres: _genres, ...columns } = film;
      const after = { ...columns, ...dto };

      this.writeGuard.assertFilmUpdate(before, after);

      await tx.update(Film, { film_id: id }, dto);
      await this.auditService.recordFilmStatusChange(tx, before, after);

      return this.findOne(id, tx);
    });
  }

  async remove(id: number): Promise<void> {
    const result = await this.filmRepository.delete({ film_id: id });
    if (!result.affected) {
      throw new RecordNotFoundException('Film', id);
    }
    this.logger.log(`Film ${id} deleted`);
  }

  /**
   * Attach genres to a film; the first genre is flagged primary. Duplicates and blanks are dropped.
   */
  async addGenres(filmId: number, genres: string[], manager?: EntityManager): Promise<FilmGenre[]> {
    const unique = normalizeGenres(genres);

    return inTransaction(this.dataSource, manager, async (tx) => {
      const existing = await tx.count(FilmGenre, { where: { film_id: filmId } });
      const rows = unique.map((genre, index) =>
        tx.create(FilmGenre, { film_id: filmId, genre, is_primary: existing === 0 && index === 0 }),
      );

      if (rows.length > 0) {
        await withStoreErrors({ entity: 'Film genre', key: { film_id: filmId } }, () =>
          tx.insert(FilmGenre, rows),
        );
      }
      return rows;
    });
  }

  async listGenres(filmId: number): Promise<FilmGenre[]> {
    return this.genreRepository.find({
      where: { film_id: filmId },
      order: { is_primary: 'DESC', genre: 'ASC' },
    });
  }

  async setCertificate(filmId: number, dto: CreateCertificateDto): Promise<FilmCertificate> {
    await this.findOne(filmId);
    return withStoreErrors({ entity: 'Film certificate', key: { film_id: filmId } }, () =>
      this.certificateRepository.save(this.certificateRepository.create({ ...dto, film_id: filmId })),
    );
  }

  async getCertificate(filmId: number): Promise<FilmCertificate> {
    const certificate = await this.certificateRepository.findOne({ where: { film_id: filmId } });
    if (!certificate) {
      throw new RecordNotFoundException('Film certificate', filmId);
    }
    return certificate;
  }

  async addScene(filmId: number, dto: CreateSceneDto): Promise<Scene> {
    await this.findOne(filmId);
    return this.sceneRepository.save(this.sceneRepository.create({ ...dto, film_id: filmId }));
  }

  async listScenes(filmId: number): Promise<Scene[]> {
    return this.sceneRepository.find({ where: { film_id: filmId }, order: { scene_id: 'ASC' } });
  }

  async recordFilming(filmId: number, dto: CreateSceneFilmingDto): Promise<SceneFilming> {
    const scene = await this.sceneRepository.findOne({ where: { scene_id: dto.scene_id } });
    if (!scene) {
      throw new RecordNotFoundException('Scene', dto.scene_id);
    }
    if (scene.film_id !== filmId) {
      throw new ValidationException('scene_filming.scene_film', 'Scene does not belong to this film', {
        film_id: filmId,
        scene_id: dto.scene_id,
      });
    }

    return withStoreErrors(
      { entity: 'Scene filming', key: { film_id: filmId, scene_id: dto.scene_id, crew_id: dto.crew_id } },
      () => this.filmingRepository.save(this.filmingRepository.create({ ...dto, film_id: filmId })),
    );
  }

  async listFilmings(filmId: number): Promise<SceneFilming[]> {
    return this.filmingRepository.find({ where: { film_id: filmId }, order: { filming_id: 'ASC' } });
  }
}

/**
 * Trim, drop blanks and de-duplicate case-insensitively, keeping first-seen order
 */
export function normalizeGenres(genres: string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];

  for (const raw of genres) {
    const genre = raw.trim();
    const key = genre.toLowerCase();
    if (genre && !seen.has(key)) {
      seen.add(key);
      result.push(genre);
    }
  }

  return result;
}
