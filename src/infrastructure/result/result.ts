type ResultState<T> =
	| { readonly success: true; readonly data: T }
	| { readonly success: false; readonly error: Error };

/**
 * Generic result type
 * Represents the result of an operation that can succeed or fail
 */
export class Result<T> {
	private constructor(private readonly state: ResultState<T>) {}

	static success<T>(data: T): Result<T> {
		return new Result<T>({ success: true, data });
	}

	static failure<T>(error: Error): Result<T> {
		return new Result<T>({ success: false, error });
	}

	get success(): boolean {
		return this.state.success;
	}

	/**
	 * Error information (only available if success is false)
	 */
	get error(): Error | undefined {
		return this.state.success ? undefined : this.state.error;
	}

	/**
	 * Maps the result data to a new type
	 */
	map<U>(fn: (data: T) => U): Result<U> {
		return this.state.success ? Result.success(fn(this.state.data)) : Result.failure<U>(this.state.error);
	}

	/**
	 * Collapses the result into a single value
	 * @param onSuccess - Called with the data of a successful result
	 * @param onFailure - Called with the error of a failed result
	 */
	fold<U>(onSuccess: (data: T) => U, onFailure: (error: Error) => U): U {
		return this.state.success ? onSuccess(this.state.data) : onFailure(this.state.error);
	}
}
