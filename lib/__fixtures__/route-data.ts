import { msl } from '@/lib/core/vertical-distance';
import { NavigationDataBuilder } from '@/lib/nd/builder';
import type { NavigationData } from '@/lib/nd/navigation-data';
import { makeAirport, makeRunway, makeTerminalWaypoint } from './entities';

// Hamburg (EDDH) with VRPs N1 and N2, Luebeck (EDHL) with VRP W close to
// Hamburg, and Heringsdorf (EDAH) with a VRP named W as well.
export const EDDH = makeAirport('EDDH', 53.63031, 9.98823, { magVar: 2, elevation: msl(53) });
export const EDHL = makeAirport('EDHL', 53.805, 10.71778, {
  magVar: 2,
  elevation: msl(55),
  runways: [makeRunway('07', { bearing: 72, lengthFt: 6896 })]
});
export const EDAH = makeAirport('EDAH', 53.87871, 14.15235, { magVar: 4, elevation: msl(94) });

export const EDDH_N1 = makeTerminalWaypoint('EDDH', 'N1', 53.80585, 10.03181);
export const EDDH_N2 = makeTerminalWaypoint('EDDH', 'N2', 53.6825, 10.0016);
export const EDHL_W = makeTerminalWaypoint('EDHL', 'W', 53.83202, 10.55466);
export const EDAH_W = makeTerminalWaypoint('EDAH', 'W', 53.84828, 13.92319);

export function routeNavigationData(): NavigationData {
  return new NavigationDataBuilder()
    .addAirport(EDDH)
    .addAirport(EDHL)
    .addAirport(EDAH)
    .addWaypoint(EDDH_N1)
    .addWaypoint(EDDH_N2)
    .addWaypoint(EDHL_W)
    .addWaypoint(EDAH_W)
    .build();
}
