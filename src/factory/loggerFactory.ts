import {
    ApiRouteLogger,
    ErrorRouteLogger,
    AuthRouteLogger,
    DatasetRouteLogger,
    ApprovalRouteLogger,
    AnnotationRouteLogger,
    LoggerDecorator
} from "../utils/loggerDecorator";

// Factory for creating logger decorators
export class LoggerFactory {
    private static instance: LoggerFactory;

    private constructor() {}

    public static getInstance(): LoggerFactory {
        if (!LoggerFactory.instance) {
            LoggerFactory.instance = new LoggerFactory();
        }
        return LoggerFactory.instance;
    }

    public createApiLogger(wrappedLogger?: LoggerDecorator): ApiRouteLogger {
        return new ApiRouteLogger(wrappedLogger);
    }

    public createErrorLogger(wrappedLogger?: LoggerDecorator): ErrorRouteLogger {
        return new ErrorRouteLogger(wrappedLogger);
    }

    public createAuthLogger(wrappedLogger?: LoggerDecorator): AuthRouteLogger {
        return new AuthRouteLogger(wrappedLogger);
    }

    public createDatasetLogger(wrappedLogger?: LoggerDecorator): DatasetRouteLogger {
        return new DatasetRouteLogger(wrappedLogger);
    }

    public createApprovalLogger(wrappedLogger?: LoggerDecorator): ApprovalRouteLogger {
        return new ApprovalRouteLogger(wrappedLogger);
    }

    public createAnnotationLogger(wrappedLogger?: LoggerDecorator): AnnotationRouteLogger {
        return new AnnotationRouteLogger(wrappedLogger);
    }
}

export const loggerFactory = LoggerFactory.getInstance();

// Export classes for type imports
export {
    ApiRouteLogger,
    ErrorRouteLogger,
    AuthRouteLogger,
    DatasetRouteLogger,
    ApprovalRouteLogger,
    AnnotationRouteLogger
};
