import { format } from 'date-fns';

/**
 * Second-resolution stamp used in every generated file name. Two requests
 * finishing within the same second get the same names.
 */
export function fileTimestamp(date: Date = new Date()): string {
    return format(date, 'yyyyMMdd_HHmmss');
}

export const tempImageName = (date?: Date) => `temp_${fileTimestamp(date)}.jpg`;

export const annotatedImageName = (date?: Date) => `annotated_${fileTimestamp(date)}.jpg`;

export const reportFileName = (domain: string, date?: Date) => `report_${domain}_${fileTimestamp(date)}.pdf`;
