import type { NextRequest } from 'next/server';
import { beginCycle } from '../../../../lib/cycle';
import { redirectWithOutcome, storageErrorResponse } from '../../../../lib/responses';
import { loginAction } from '../../../../lib/staff-actions';

export async function POST(request: NextRequest) {
  try {
    const outcome = await loginAction(beginCycle(), await request.formData());
    return redirectWithOutcome(request, outcome);
  } catch (error) {
    return storageErrorResponse(error);
  }
}
