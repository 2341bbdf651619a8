/**
 * Success response envelope shared by every JSON route
 */
export const formatSuccessResponse = <T>(data: T, message?: string, meta?: Record<string, unknown>) => {
    return {
        success: true as const,
        data,
        message: message || 'Operation completed successfully',
        timestamp: new Date().toISOString(),
        ...(meta && { meta })
    };
};
