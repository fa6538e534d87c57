import { probeIndexSanity } from '../../probes/index-sanity';
import { runScript } from '../script';

runScript('TEST 03: Index Sanity', probeIndexSanity);
