import type { NextRequest } from 'next/server';
import { redirectWithOutcome } from '../../../../lib/responses';
import { logoutAction } from '../../../../lib/staff-actions';

export function POST(request: NextRequest) {
  return redirectWithOutcome(request, logoutAction());
}
