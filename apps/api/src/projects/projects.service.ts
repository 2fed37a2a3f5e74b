import {
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
  UnprocessableEntityException,
} from '@nestjs/common';
import type { Project } from '@gcpanel/types';
import type { ProjectCreateInput, ProjectUpdateInput } from '@gcpanel/validation';
import { v4 as uuidv4 } from 'uuid';

import { Clock } from '../common/clock';
import { SequenceLock } from '../common/sequence-lock.service';
import { ProjectsRepository } from './projects.repository';

@Injectable()
export class ProjectsService {
  private readonly logger = new Logger('ProjectsService');

  constructor(
    private readonly repo: ProjectsRepository,
    private readonly clock: Clock,
    private readonly lock: SequenceLock,
  ) {}

  async create(tenantId: string, input: ProjectCreateInput): Promise<Project> {
    return this.lock.run(`projects:${tenantId}`, async () => {
      if (await this.repo.findByNumber(tenantId, input.projectNumber)) {
        throw new ConflictException(`Project number ${input.projectNumber} already exists`);
      }
      const now = this.clock.timestamp();
      const project: Project = {
        id: uuidv4(),
        tenantId,
        ...input,
        createdAt: now,
        updatedAt: now,
      };
      await this.repo.save(project);
      this.logger.log(`Created project ${project.projectNumber}`, { tenantId, projectId: project.id });
      return project;
    });
  }

  async list(tenantId: string): Promise<Project[]> {
    const projects = await this.repo.list(tenantId);
    return projects.sort((a, b) => a.name.localeCompare(b.name));
  }

  /** Resolves the project or answers 404; used by every project-scoped feature. */
  async getOrThrow(tenantId: string, id: string): Promise<Project> {
    const project = await this.repo.get(tenantId, id);
    if (!project) {
      throw new NotFoundException(`Project ${id} not found`);
    }
    return project;
  }

  async update(tenantId: string, id: string, input: ProjectUpdateInput): Promise<Project> {
    const current = await this.getOrThrow(tenantId, id);
    const updated: Project = { ...current, ...input, updatedAt: this.clock.timestamp() };
    const start = updated.startDate;
    const end = updated.plannedCompletionDate;
    if (start && end && end < start) {
      throw new UnprocessableEntityException({
        error: 'ValidationError',
        issues: [
          { path: ['plannedCompletionDate'], message: 'plannedCompletionDate must not be before startDate' },
        ],
      });
    }
    return this.repo.save(updated);
  }

  async remove(tenantId: string, id: string): Promise<void> {
    if (!(await this.repo.delete(tenantId, id))) {
      throw new NotFoundException(`Project ${id} not found`);
    }
    this.logger.log(`Deleted project ${id}`, { tenantId });
  }
}
