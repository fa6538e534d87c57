import * as path from 'path';
import { probePhraseMatrix } from '../../probes/phrase-matrix';
import { runScript } from '../script';

runScript('RELEASE TEST 01: Matrix Exact Phrases', probePhraseMatrix(path.join(__dirname, 'phrase-matrix.json')));
