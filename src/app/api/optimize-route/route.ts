import { createOptimizeRouteHandler } from '@/lib/http/optimize-route';
import { getFuelPlanner } from '@/lib/services/fuel-planner';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

export const POST = createOptimizeRouteHandler(() => getFuelPlanner());
