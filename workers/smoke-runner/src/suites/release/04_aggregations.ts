import { probeAggregations } from '../../probes/aggregations';
import { runScript } from '../script';

runScript('RELEASE TEST 04: Aggregations', probeAggregations);
