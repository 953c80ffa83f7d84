// src/simulation/index.ts

import { logger } from '../logger';
import { runDaySimulation } from './runDaySimulation';

runDaySimulation()
    .then(summary => {
        process.exitCode = summary.invariantsHold ? 0 : 1;
    })
    .catch(err => {
        logger.fatal({ err }, 'simulation failed');
        process.exitCode = 1;
    });
