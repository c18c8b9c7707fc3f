import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Actor } from './entities/actor.entity';
import { Director } from './entities/director.entity';
import { Producer } from './entities/producer.entity';
import { CreateActorDto } from './dto/create-actor.dto';
import { UpdateActorDto } from './dto/update-actor.dto';
import { CreateDirectorDto } from './dto/create-director.dto';
import { UpdateDirectorDto } from './dto/update-director.dto';
import { CreateProducerDto } from './dto/create-producer.dto';
import { UpdateProducerDto } from './dto/update-producer.dto';
import { WriteGuardService } from '../../validation/write-guard.service';
import { RecordNotFoundException } from '../../common/exceptions/record-not-found.exception';

/**
 * Talent Service - actors, directors and producers
 */
@Injectable()
export class TalentService {
  constructor(
    @InjectRepository(Actor)
    private actorRepository: Repository<Actor>,
    @InjectRepository(Director)
    private directorRepository: Repository<Director>,
    @InjectRepository(Producer)
    private producerRepository: Repository<Producer>,
    private writeGuard: WriteGuardService,
  ) {}

  async createActor(dto: CreateActorDto): Promise<Actor> {
    this.writeGuard.assertActorInsert(dto);
    return this.actorRepository.save(this.actorRepository.create(dto));
  }

  async findActors(): Promise<Actor[]> {
    return this.actorRepository.find({ order: { last_name: 'ASC', first_name: 'ASC' } });
  }

  async findActor(id: number): Promise<Actor> {
    const actor = await this.actorRepository.findOne({ where: { actor_id: id } });
    if (!actor) {
      throw new RecordNotFoundException('Actor', id);
    }
    return actor;
  }

  async updateActor(id: number, dto: UpdateActorDto): Promise<Actor> {
    const actor = await this.findActor(id);
    Object.assign(actor, dto);
    return this.actorRepository.save(actor);
  }

  /**
   * Cascades to the actor's roles; role deletions made this way are not audited
   */
  async removeActor(id: number): Promise<void> {
    const actor = await this.findActor(id);
    await this.actorRepository.remove(actor);
  }

  async createDirector(dto: CreateDirectorDto): Promise<Director> {
    return this.directorRepository.save(this.directorRepository.create(dto));
  }

  async findDirectors(): Promise<Director[]> {
    return this.directorRepository.find({ order: { name: 'ASC' } });
  }

  async findDirector(id: number): Promise<Director> {
    const director = await this.directorRepository.findOne({ where: { director_id: id } });
    if (!director) {
      throw new RecordNotFoundException('Director', id);
    }
    return director;
  }

  async updateDirector(id: number, dto: UpdateDirectorDto): Promise<Director> {
    const director = await this.findDirector(id);
    Object.assign(director, dto);
    return this.directorRepository.save(director);
  }

  /**
   * Films keep existing with `director_id` cleared
   */
  async removeDirector(id: number): Promise<void> {
    const director = await this.findDirector(id);
    await this.directorRepository.remove(director);
  }

  async createProducer(dto: CreateProducerDto): Promise<Producer> {
    return this.producerRepository.save(this.producerRepository.create(dto));
  }

  async findProducers(): Promise<Producer[]> {
    return this.producerRepository.find({ order: { name: 'ASC' } });
  }

  async findProducer(id: number): Promise<Producer> {
    const producer = await this.producerRepository.findOne({ where: { producer_id: id } });
    if (!producer) {
      throw new RecordNotFoundException('Producer', id);
    }
    return producer;
  }

  async updateProducer(id: number, dto: UpdateProducerDto): Promise<Producer> {
    const producer = await this.findProducer(id);
    Object.assign(producer, dto);
    return this.producerRepository.save(producer);
  }

  async removeProducer(id: number): Promise<void> {
    const producer = await this.findProducer(id);
    await this.producerRepository.remove(producer);
  }
}
