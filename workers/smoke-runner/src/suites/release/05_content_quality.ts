import { probeContentQuality } from '../../probes/content-quality';
import { runScript } from '../script';

runScript('RELEASE TEST 05: Content Quality', probeContentQuality);
