import { probeExactPhrase } from '../../probes/exact-phrase';
import { runScript } from '../script';

runScript('TEST 02: Exact Phrase ES vs Agent', probeExactPhrase);
