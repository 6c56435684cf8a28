/**
 * Registration Service
 * ====================
 *
 * Front-desk side of the visit: opens a registration with its fee.
 * The settlement engine later bills the fee and advances the status.
 *
 * @module domains/registration/services
 */

import { z } from 'zod';
import { logger } from '@/lib/logger';
import { Errors } from '../../shared/errors';
import { systemClock, type Clock, type SettlementContext } from '../../shared/types';
import { parseOrThrow } from '../../shared/validation';
import type { SequenceGenerator } from '../../sequence';
import type { RegistrationRepository } from '../repositories';
import {
  REGISTRATION_STATUS,
  type CreateRegistrationInput,
  type Registration,
} from '../types';

const createRegistrationSchema = z.object({
  patientId: z.number().int().positive(),
  registrationFee: z.number().int().nonnegative(),
});

export interface RegistrationService {
  register(input: CreateRegistrationInput, ctx: SettlementContext): Promise<Registration>;
  getRegistration(id: number): Registration;
}

export interface RegistrationServiceDeps {
  registrations: RegistrationRepository;
  sequence: SequenceGenerator;
  clock?: Clock;
}

export function createRegistrationService(deps: RegistrationServiceDeps): RegistrationService {
  const { registrations, sequence, clock = systemClock } = deps;

  return {
    async register(rawInput, ctx) {
      const input = parseOrThrow(createRegistrationSchema, rawInput, 'Invalid registration');
      const regNo = await sequence.next('registration', ctx);
      const registration = registrations.insert(
        regNo,
        input.patientId,
        input.registrationFee,
        REGISTRATION_STATUS.WAITING,
        clock().toISOString()
      );

      logger.info('[Registration] Opened', {
        regNo,
        patientId: input.patientId,
        requestId: ctx.requestId,
      });
      return registration;
    },

    getRegistration(id) {
      const registration = registrations.findById(id);
      if (!registration) {
        throw Errors.registrationNotFound(id);
      }
      return registration;
    },
  };
}
