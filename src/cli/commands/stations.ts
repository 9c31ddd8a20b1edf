import { loadStations } from '../stations.js';

export function stationsCommand(): void {
  console.log(loadStations().join('\n'));
}
