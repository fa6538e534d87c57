import { probeIndexHealth } from '../../probes/index-health';
import { runScript } from '../script';

runScript('RELEASE TEST 03: Index Health', probeIndexHealth);
