import { probeHealthEndpoints } from '../../probes/health-endpoints';
import { runScript } from '../script';

runScript('TEST 01: Health Endpoints', probeHealthEndpoints);
