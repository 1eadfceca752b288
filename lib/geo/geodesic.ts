import type { Coordinate } from '@/lib/geo/coordinate';
import { NM_TO_METERS } from '@/lib/constants';

const DEG_TO_RAD = Math.PI / 180;
const RAD_TO_DEG = 180 / Math.PI;
const WGS84_SEMI_MAJOR_METERS = 6378137;
const WGS84_FLATTENING = 1 / 298.257223563;
const WGS84_SEMI_MINOR_METERS = WGS84_SEMI_MAJOR_METERS * (1 - WGS84_FLATTENING);
const WGS84_MEAN_RADIUS_METERS = 6371008.8;
const MAX_ITERATIONS = 200;
const CONVERGENCE = 1e-12;

export interface GeodesicInverse {
  distanceMeters: number;
  initialBearing: number;
}

export function normalizeBearing(degrees: number): number {
  return ((degrees % 360) + 360) % 360;
}

function reducedLatitude(latitudeDeg: number): number {
  return Math.atan((1 - WGS84_FLATTENING) * Math.tan(latitudeDeg * DEG_TO_RAD));
}

function ellipsoidCoefficients(cosSqAlpha: number) {
  const a = WGS84_SEMI_MAJOR_METERS;
  const b = WGS84_SEMI_MINOR_METERS;
  const uSq = (cosSqAlpha * (a * a - b * b)) / (b * b);
  const bigA = 1 + (uSq / 16384) * (4096 + uSq * (-768 + uSq * (320 - 175 * uSq)));
  const bigB = (uSq / 1024) * (256 + uSq * (-128 + uSq * (74 - 47 * uSq)));
  return { bigA, bigB };
}

function deltaSigma(bigB: number, sinSigma: number, cosSigma: number, cos2SigmaM: number): number {
  return (
    bigB *
    sinSigma *
    (cos2SigmaM +
      (bigB / 4) *
        (cosSigma * (-1 + 2 * cos2SigmaM * cos2SigmaM) -
          (bigB / 6) *
            cos2SigmaM *
            (-3 + 4 * sinSigma * sinSigma) *
            (-3 + 4 * cos2SigmaM * cos2SigmaM)))
  );
}

// Near-antipodal pairs where the ellipsoidal iteration does not settle.
function sphericalInverse(from: Coordinate, to: Coordinate): GeodesicInverse {
  const phi1 = from.latitude * DEG_TO_RAD;
  const phi2 = to.latitude * DEG_TO_RAD;
  const dPhi = phi2 - phi1;
  const dLambda = (to.longitude - from.longitude) * DEG_TO_RAD;
  const h =
    Math.sin(dPhi / 2) ** 2 + Math.cos(phi1) * Math.cos(phi2) * Math.sin(dLambda / 2) ** 2;
  const distanceMeters = 2 * WGS84_MEAN_RADIUS_METERS * Math.asin(Math.min(1, Math.sqrt(h)));
  const y = Math.sin(dLambda) * Math.cos(phi2);
  const x = Math.cos(phi1) * Math.sin(phi2) - Math.sin(phi1) * Math.cos(phi2) * Math.cos(dLambda);
  return { distanceMeters, initialBearing: normalizeBearing(Math.atan2(y, x) * RAD_TO_DEG) };
}

/**
 * Vincenty's inverse solution on the WGS-84 ellipsoid.
 */
export function geodesicInverse(from: Coordinate, to: Coordinate): GeodesicInverse {
  const f = WGS84_FLATTENING;
  const bigL = (to.longitude - from.longitude) * DEG_TO_RAD;
  const u1 = reducedLatitude(from.latitude);
  const u2 = reducedLatitude(to.latitude);
  const sinU1 = Math.sin(u1);
  const cosU1 = Math.cos(u1);
  const sinU2 = Math.sin(u2);
  const cosU2 = Math.cos(u2);

  let lambda = bigL;
  let sinSigma = 0;
  let cosSigma = 1;
  let sigma = 0;
  let cosSqAlpha = 1;
  let cos2SigmaM = 0;
  let converged = false;

  for (let i = 0; i < MAX_ITERATIONS; i++) {
    const sinLambda = Math.sin(lambda);
    const cosLambda = Math.cos(lambda);
    sinSigma = Math.sqrt(
      (cosU2 * sinLambda) ** 2 + (cosU1 * sinU2 - sinU1 * cosU2 * cosLambda) ** 2
    );
    if (sinSigma === 0) {
      return { distanceMeters: 0, initialBearing: 0 };
    }
    cosSigma = sinU1 * sinU2 + cosU1 * cosU2 * cosLambda;
    sigma = Math.atan2(sinSigma, cosSigma);
    const sinAlpha = (cosU1 * cosU2 * sinLambda) / sinSigma;
    cosSqAlpha = 1 - sinAlpha * sinAlpha;
    // Equatorial line: cosSqAlpha is zero.
    cos2SigmaM = cosSqAlpha !== 0 ? cosSigma - (2 * sinU1 * sinU2) / cosSqAlpha : 0;
    const c = (f / 16) * cosSqAlpha * (4 + f * (4 - 3 * cosSqAlpha));
    const previous = lambda;
    lambda =
      bigL +
      (1 - c) *
        f *
        sinAlpha *
        (sigma + c * sinSigma * (cos2SigmaM + c * cosSigma * (-1 + 2 * cos2SigmaM * cos2SigmaM)));
    if (Math.abs(lambda - previous) < CONVERGENCE) {
      converged = true;
      break;
    }
  }

  if (!converged) {
    return sphericalInverse(from, to);
  }

  const { bigA, bigB } = ellipsoidCoefficients(cosSqAlpha);
  const distanceMeters =
    WGS84_SEMI_MINOR_METERS * bigA * (sigma - deltaSigma(bigB, sinSigma, cosSigma, cos2SigmaM));
  const alpha1 = Math.atan2(
    cosU2 * Math.sin(lambda),
    cosU1 * sinU2 - sinU1 * cosU2 * Math.cos(lambda)
  );

  return { distanceMeters, initialBearing: normalizeBearing(alpha1 * RAD_TO_DEG) };
}

export function geodesicDistanceMeters(from: Coordinate, to: Coordinate): number {
  return geodesicInverse(from, to).distanceMeters;
}

export function geodesicDistanceNm(from: Coordinate, to: Coordinate): number {
  return geodesicInverse(from, to).distanceMeters / NM_TO_METERS;
}

/** Initial true bearing in [0, 360). */
export function geodesicBearing(from: Coordinate, to: Coordinate): number {
  return geodesicInverse(from, to).initialBearing;
}

/**
 * Vincenty's direct solution: the point reached from `origin` after
 * travelling `distanceMeters` on the initial true bearing.
 */
export function geodesicDestination(
  origin: Coordinate,
  bearingDeg: number,
  distanceMeters: number
): Coordinate {
  const f = WGS84_FLATTENING;
  const alpha1 = bearingDeg * DEG_TO_RAD;
  const sinAlpha1 = Math.sin(alpha1);
  const cosAlpha1 = Math.cos(alpha1);
  const tanU1 = (1 - f) * Math.tan(origin.latitude * DEG_TO_RAD);
  const cosU1 = 1 / Math.sqrt(1 + tanU1 * tanU1);
  const sinU1 = tanU1 * cosU1;
  const sigma1 = Math.atan2(tanU1, cosAlpha1);
  const sinAlpha = cosU1 * sinAlpha1;
  const cosSqAlpha = 1 - sinAlpha * sinAlpha;
  const { bigA, bigB } = ellipsoidCoefficients(cosSqAlpha);

  const sigmaBase = distanceMeters / (WGS84_SEMI_MINOR_METERS * bigA);
  let sigma = sigmaBase;
  let sinSigma = Math.sin(sigma);
  let cosSigma = Math.cos(sigma);
  let cos2SigmaM = Math.cos(2 * sigma1 + sigma);

  for (let i = 0; i < MAX_ITERATIONS; i++) {
    cos2SigmaM = Math.cos(2 * sigma1 + sigma);
    sinSigma = Math.sin(sigma);
    cosSigma = Math.cos(sigma);
    const previous = sigma;
    sigma = sigmaBase + deltaSigma(bigB, sinSigma, cosSigma, cos2SigmaM);
    if (Math.abs(sigma - previous) < CONVERGENCE) break;
  }

  cos2SigmaM = Math.cos(2 * sigma1 + sigma);
  sinSigma = Math.sin(sigma);
  cosSigma = Math.cos(sigma);

  const x = sinU1 * sinSigma - cosU1 * cosSigma * cosAlpha1;
  const phi2 = Math.atan2(
    sinU1 * cosSigma + cosU1 * sinSigma * cosAlpha1,
    (1 - f) * Math.sqrt(sinAlpha * sinAlpha + x * x)
  );
  const lambda = Math.atan2(sinSigma * sinAlpha1, cosU1 * cosSigma - sinU1 * sinSigma * cosAlpha1);
  const c = (f / 16) * cosSqAlpha * (4 + f * (4 - 3 * cosSqAlpha));
  const bigL =
    lambda -
    (1 - c) *
      f *
      sinAlpha *
      (sigma + c * sinSigma * (cos2SigmaM + c * cosSigma * (-1 + 2 * cos2SigmaM * cos2SigmaM)));

  let longitude = origin.longitude + bigL * RAD_TO_DEG;
  if (longitude > 180) longitude -= 360;
  if (longitude < -180) longitude += 360;

  return { latitude: phi2 * RAD_TO_DEG, longitude };
}
