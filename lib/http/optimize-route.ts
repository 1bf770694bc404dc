import { NextRequest, NextResponse } from 'next/server';
import { z } from 'zod';
import { loadConfig } from '@/lib/config';
import { PlannerError, toPlannerError } from '@/lib/errors';
import type { ErrorResponse } from '@/lib/types';
import type { FuelPlanner } from '@/lib/services/fuel-planner';
import { presentPlan } from '@/lib/http/presenters';
import { raceAbort } from '@/lib/utils/retry';

export const LOCATIONS_REQUIRED_MESSAGE = 'Start and finish locations are required.';

const bodySchema = z.object({
    start: z.string().trim().min(1),
    finish: z.string().trim().min(1),
});

function errorResponse(err: PlannerError) {
    return NextResponse.json(
        { error: err.message, code: err.code } satisfies ErrorResponse,
        { status: err.status }
    );
}

/**
 * POST handler for /api/optimize-route. The planner is only resolved once the
 * body has both locations, so a bad request never triggers the geocoding sweep
 * or any Google Maps call. The request deadline starts before the planner is
 * resolved, so a cold start that is still geocoding answers 504 in time.
 */
export function createOptimizeRouteHandler(
    getPlanner: () => Promise<FuelPlanner>,
    getTimeoutMs: () => number = () => loadConfig().requestTimeoutMs
) {
    return async function POST(request: NextRequest) {
        let body: unknown = null;
        try {
            body = await request.json();
        } catch {
            body = null;
        }

        const parsed = bodySchema.safeParse(body);
        if (!parsed.success) {
            return errorResponse(new PlannerError('INPUT_INVALID', LOCATIONS_REQUIRED_MESSAGE));
        }

        try {
            const signal = AbortSignal.timeout(getTimeoutMs());
            const planner = await raceAbort(getPlanner(), signal);
            const plan = await planner.plan(parsed.data, signal);
            return NextResponse.json(presentPlan(plan));
        } catch (err: unknown) {
            const plannerError = toPlannerError(err);
            if (plannerError.status >= 500) {
                console.error('[OPTIMIZE_ROUTE_ERROR]', err);
            } else {
                console.warn(`[OPTIMIZE_ROUTE] ${plannerError.code}: ${plannerError.message}`);
            }
            return errorResponse(plannerError);
        }
    };
}
