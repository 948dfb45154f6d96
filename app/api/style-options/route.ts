import { NextResponse } from 'next/server';
import { STYLE_OPTIONS } from '@/lib/cup/styles';

export function GET() {
  const options = Object.entries(STYLE_OPTIONS).map(([value, label]) => ({
    value: Number(value),
    label
  }));
  return NextResponse.json(options, {
    headers: { 'cache-control': 'public, max-age=86400' }
  });
}
