import { probeServiceSurface } from '../../probes/service-surface';
import { runScript } from '../script';

runScript('RELEASE TEST 02: Service Surface', probeServiceSurface);
