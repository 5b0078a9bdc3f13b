import express, { type Request, type Response } from 'express';
import { asyncHandler, NotFoundError, ValidationError } from '../middleware/error.middleware';
import { formatZodErrors } from '../middleware/validation.middleware';
import { doctorQuerySchema } from '../schemas/call.schemas';
import type { DatabaseService } from '../services/database.service';
import type { ApiSuccessResponse } from '../types/api.types';
import type { Doctor } from '../types/appointment.types';

export const createDoctorsRouter = (database: Pick<DatabaseService, 'findDoctorByNameOrSpecialty'>) => {
  const router = express.Router();

  // Look up a doctor by name or specialization, optionally within one hospital
  router.get('/doctors', asyncHandler(async (req: Request, res: Response) => {
    const parsed = doctorQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      throw new ValidationError('Invalid doctor query', formatZodErrors(parsed.error));
    }

    const { query, hospitalId } = parsed.data;
    const doctor = await database.findDoctorByNameOrSpecialty(query, hospitalId);
    if (!doctor) {
      throw new NotFoundError(`No doctor found matching "${query}"`);
    }

    const body: ApiSuccessResponse<Doctor> = { success: true, data: doctor };
    res.json(body);
  }));

  return router;
};
