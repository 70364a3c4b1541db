import express, { Request, Response, NextFunction } from 'express';
import fs from 'fs/promises';
import { logger } from '../config/logger';
import { REQUIRED_COLUMNS } from '../constants/utilityColumns';
import { BadRequestError, errorMessage } from '../errors';
import { upload, handleUploadErrors } from '../middleware/upload';
import { UtilityDataValidator } from '../services/utility-validation/UtilityDataValidator';
import { NumberUtils } from '../utils/numberUtils';

const router = express.Router();

function thresholdField(body: unknown, field: 'minValue' | 'maxValue'): number | undefined {
  if (typeof body !== 'object' || body === null || !(field in body)) {
    return undefined;
  }

  const raw: unknown = Reflect.get(body, field);
  if (raw === undefined || raw === '') {
    return undefined;
  }
  if (typeof raw === 'number') {
    return raw;
  }

  const value = typeof raw === 'string' ? NumberUtils.parseNumber(raw) : null;
  if (value === null) {
    throw new BadRequestError(`${field} must be a number`, { [field]: raw });
  }
  return value;
}

/**
 * Download CSV template for utility data
 * GET /api/validation/template
 */
router.get('/template', (_req: Request, res: Response) => {
  const templateHeader = REQUIRED_COLUMNS.join(',');
  const sampleRow = ['2024-01-01', '12500', '340', '45.5'].join(',');

  res.setHeader('Content-Type', 'text/csv');
  res.setHeader('Content-Disposition', 'attachment; filename="utility_data_template.csv"');
  res.send(`${templateHeader}\n${sampleRow}`);
});

/**
 * Validate an uploaded utility data file
 * POST /api/validation/upload
 */
router.post(
  '/upload',
  upload.single('file'),
  handleUploadErrors,
  async (req: Request, res: Response, next: NextFunction) => {
    const file = req.file;

    try {
      if (!file) {
        throw new BadRequestError('No file uploaded');
      }

      logger.info(`File upload received: ${file.originalname}`);

      const report = UtilityDataValidator.validate(file.path, {
        minValueThreshold: thresholdField(req.body, 'minValue'),
        maxValueThreshold: thresholdField(req.body, 'maxValue'),
      });

      res.status(200).json({ ...report, input_file: file.originalname });
    } catch (error) {
      next(error);
    } finally {
      if (file) {
        await fs.unlink(file.path).catch((error: unknown) => {
          logger.warn(`Failed to remove upload ${file.path}: ${errorMessage(error)}`);
        });
      }
    }
  }
);

export default router;
