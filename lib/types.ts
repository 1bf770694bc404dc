export type LatLng = {
    lat: number;
    lng: number;
};

export type RoutePoint = LatLng;

export type FuelStation = {
    id: string;
    name: string;
    address: string;
    city: string;
    state: string;
    rackId: string | null;
    retailPrice: number;
    lat: number | null;
    lng: number | null;
};

export type RouteStep = {
    endLocation: LatLng;
    distanceMeters: number;
};

export type DrivingRoute = {
    distanceMeters: number;
    distanceMiles: number;
    startLocation: LatLng;
    endLocation: LatLng;
    overviewPolyline: string;
    steps: RouteStep[];
};

export type EligibleStop = {
    station: FuelStation;
    distanceMiles: number; // to the route point it qualified against
};

export type NearbyPlace = {
    placeId: string;
    name: string;
    vicinity: string;
    lat: number;
    lng: number;
};

export type NearbyStop = {
    place: NearbyPlace;
    state: string;
    distanceMiles: number; // from the route origin
};

export type CostEstimate = {
    distanceMiles: number;
    pricePerGallon: number;
    gallons: number;
    totalCost: number;
};

export type SelectionStrategyName = 'cheapest-on-route' | 'cheapest-in-visited-states';

export type PlanRequest = {
    start: string;
    finish: string;
};

export type StationCost = {
    station: FuelStation;
    nearbyStop: NearbyStop;
    cost: CostEstimate;
};

export type CheapestOnRoutePlan = {
    strategy: 'cheapest-on-route';
    routeMap: string;
    cheapestStation: FuelStation;
    distanceToRouteMiles: number;
    totalDistanceMiles: number;
    cost: CostEstimate;
};

export type VisitedStatesPlan = {
    strategy: 'cheapest-in-visited-states';
    routeMap: string;
    cheapestStations: FuelStation[];
    visitedStates: string[];
    route: DrivingRoute;
    stationCosts?: StationCost[];
};

export type FuelPlan = CheapestOnRoutePlan | VisitedStatesPlan;

export type ErrorCode =
    | 'INPUT_INVALID'
    | 'ROUTE_NOT_FOUND'
    | 'NO_STATIONS'
    | 'UPSTREAM'
    | 'TIMEOUT'
    | 'CONFIG'
    | 'INTERNAL';

export type ErrorResponse = {
    error: string;
    code: ErrorCode;
};
