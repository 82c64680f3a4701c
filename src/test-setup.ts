import 'reflect-metadata';
import { Logger } from '@nestjs/common';

// Plain text output so assertions can match rendered tables
process.env.NO_COLOR = '1';

Logger.overrideLogger(false);
