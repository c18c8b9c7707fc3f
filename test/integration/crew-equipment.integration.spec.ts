import { Test, TestingModule } from '@nestjs/testing';
import { DataSource } from 'typeorm';
import { CatalogModule } from '../../src/catalog/catalog.module';
import { CrewService } from '../../src/catalog/crew/crew.service';
import { EquipmentService } from '../../src/catalog/equipment/equipment.service';
import { AuditService } from '../../src/audit/audit.service';
import { CrewMember } from '../../src/catalog/crew/entities/crew-member.entity';
import { Equipment } from '../../src/catalog/equipment/entities/equipment.entity';
import { EquipmentAudit } from '../../src/audit/entities/equipment-audit.entity';
import { RecordNotFoundException } from '../../src/common/exceptions/record-not-found.exception';
import { testDatabaseModules } from '../utils/test-database';
import { TestHelpers } from '../utils/test-helpers';

describe('Crew and equipment (integration)', () => {
  let module: TestingModule;
  let crewService: CrewService;
  let equipmentService: EquipmentService;
  let auditService: AuditService;
  let dataSource: DataSource;

  beforeAll(async () => {
    module = await Test.createTestingModule({
      imports: [...testDatabaseModules(), CatalogModule],
    }).compile();

    crewService = module.get<CrewService>(CrewService);
    equipmentService = module.get<EquipmentService>(EquipmentService);
    auditService = module.get<AuditService>(AuditService);
    dataSource = module.get<DataSource>(DataSource);
  });

  afterAll(async () => {
    await module.close();
  });

  beforeEach(async () => {
    await TestHelpers.clearTables(dataSource, [EquipmentAudit, Equipment, CrewMember]);
  });

  describe('crew', () => {
    it('should reject negative experience', async () => {
      await expect(crewService.create({ name: 'Rookie', role: 'Runner', experience_years: -2 })).rejects.toThrow(
        'Experience years cannot be negative',
      );
    });

    it('should reject negative experience on update and keep the stored value', async () => {
      const member = await crewService.create({ name: 'Veteran', role: 'Grip', experience_years: 12 });

      await expect(crewService.update(member.crew_id, { experience_years: -7 })).rejects.toThrow(
        'Experience years cannot be negative',
      );

      expect((await crewService.findOne(member.crew_id)).experience_years).toBe(12);
    });

    it('should refuse an unknown supervisor', async () => {
      await expect(
        crewService.create({ name: 'Orphan', role: 'Grip', supervisor_id: 777 }),
      ).rejects.toBeInstanceOf(RecordNotFoundException);
    });

    it('should refuse self-supervision on update', async () => {
      const member = await crewService.create({ name: 'Solo', role: 'Gaffer' });

      await expect(crewService.update(member.crew_id, { supervisor_id: member.crew_id })).rejects.toThrow(
        'Crew member cannot supervise themselves',
      );
    });

    it('should clear the supervisor of subordinates when the supervisor is deleted', async () => {
      const chief = await crewService.create({ name: 'Chief', role: 'Director of Photography' });
      const operator = await crewService.create({ name: 'Operator', role: 'Camera Operator', supervisor_id: chief.crew_id });

      expect((await crewService.findSubordinates(chief.crew_id)).map((m) => m.crew_id)).toEqual([operator.crew_id]);

      await crewService.remove(chief.crew_id);

      const survivor = await crewService.findOne(operator.crew_id);
      expect(survivor.supervisor_id).toBeNull();
    });
  });

  describe('equipment availability audit', () => {
    it('should reject a negative cost', async () => {
      await expect(equipmentService.create({ name: 'Broken Lens', cost: -10 })).rejects.toThrow(
        'Equipment cost cannot be negative',
      );
    });

    it('should record each availability transition', async () => {
      const crane = await equipmentService.create({ name: 'Crane', cost: 12000 });

      await equipmentService.updateAvailability(crane.equipment_id, 'In Use');
      await equipmentService.updateAvailability(crane.equipment_id, 'Under Maintenance');

      const { logs, total } = await auditService.queryEquipmentAudit({ equipment_id: crane.equipment_id });
      expect(total).toBe(2);
      expect(logs.map((log) => [log.old_availability, log.new_availability]).reverse()).toEqual([
        ['Available', 'In Use'],
        ['In Use', 'Under Maintenance'],
      ]);
      expect(logs[0].equipment_name).toBe('Crane');
    });

    it('should append nothing when availability is set to its current value', async () => {
      const dolly = await equipmentService.create({ name: 'Dolly', cost: 3000 });

      await equipmentService.updateAvailability(dolly.equipment_id, 'Available');
      await equipmentService.update(dolly.equipment_id, { condition: 'Worn' });

      expect((await auditService.queryEquipmentAudit({ equipment_id: dolly.equipment_id })).total).toBe(0);
      expect((await equipmentService.findOne(dolly.equipment_id)).condition).toBe('Worn');
    });
  });
});
