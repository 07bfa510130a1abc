// src/modules/subjects/subjects.service.ts
// Subject (patient) profiles. Every report belongs to exactly one.

import { z } from "zod";
import type { Clock } from "@/lib/clock";
import { err, ok, type Result } from "@/lib/errors/result";
import { SUBJECT_TYPES, type SubjectProfile } from "@/lib/db/schema";
import type { LabStore } from "@/lib/store/labStore";
import { UniqueConstraintError } from "@/lib/store/store.errors";
import { log } from "@/lib/observability/logger";
import {
  SubjectConflictError,
  SubjectNotFoundError,
} from "@/modules/reports/report.errors";
import { isUuid, newId } from "@/utils/uuid";

export const CreateSubjectSchema = z.object({
  externalSubjectId: z.string().trim().min(1).max(200),
  displayName: z.string().trim().min(1).max(200),
  subjectType: z.enum(SUBJECT_TYPES).default("human"),
});

export type CreateSubjectInput = z.infer<typeof CreateSubjectSchema>;

export class SubjectService {
  constructor(
    private readonly store: LabStore,
    private readonly clock: Clock,
  ) {}

  async createSubject(
    input: CreateSubjectInput,
  ): Promise<Result<SubjectProfile, SubjectConflictError>> {
    const existing = await this.store.findSubjectByExternalId(
      input.externalSubjectId,
    );
    if (existing) return err(new SubjectConflictError(input.externalSubjectId));

    try {
      const subject = await this.store.insertSubject({
        id: newId(),
        externalSubjectId: input.externalSubjectId,
        displayName: input.displayName,
        subjectType: input.subjectType,
        createdAt: this.clock.now(),
      });

      log("INFO", "SUBJECT_CREATED", {
        subjectId: subject.id,
        subjectType: subject.subjectType,
      });
      return ok(subject);
    } catch (error) {
      // lost a race with a concurrent create of the same external id
      if (error instanceof UniqueConstraintError) {
        return err(new SubjectConflictError(input.externalSubjectId));
      }
      throw error;
    }
  }

  async getSubject(
    id: string,
  ): Promise<Result<SubjectProfile, SubjectNotFoundError>> {
    const subject = isUuid(id) ? await this.store.findSubjectById(id) : null;
    return subject ? ok(subject) : err(new SubjectNotFoundError(id));
  }

  listSubjects(): Promise<SubjectProfile[]> {
    return this.store.listSubjects();
  }
}
