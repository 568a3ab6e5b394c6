import { BadRequestException, NotFoundException, PayloadTooLargeException } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { UpstreamUnavailableException } from '../exceptions/pipeline.exceptions';
import { detailErrorBody, gatewayErrorBody, HttpErrorFilter } from './http-error.filter';

const mockResponse = () => {
    const res = { status: jest.fn(), json: jest.fn() };
    res.status.mockReturnValue(res);
    return res;
};

describe('HttpErrorFilter', () => {
    const tooLarge = 'File too large. Maximum size is 16MB';

    it('renders gateway errors as success:false bodies', () => {
        const res = mockResponse();

        new HttpErrorFilter(gatewayErrorBody).catch(new UpstreamUnavailableException(), new ExecutionContextHost([{}, res]));

        expect(res.status).toHaveBeenCalledWith(503);
        expect(res.json).toHaveBeenCalledWith({
            success: false,
            error: 'Detection service unreachable. Please ensure it is running.',
        });
    });

    it('renders detection errors as detail bodies', () => {
        const res = mockResponse();

        new HttpErrorFilter(detailErrorBody).catch(new NotFoundException('Result not found'), new ExecutionContextHost([{}, res]));

        expect(res.status).toHaveBeenCalledWith(404);
        expect(res.json).toHaveBeenCalledWith({ detail: 'Result not found' });
    });

    it('turns an oversize upload into a 400', () => {
        const res = mockResponse();

        new HttpErrorFilter(gatewayErrorBody, tooLarge).catch(
            new PayloadTooLargeException('File too large'),
            new ExecutionContextHost([{}, res]),
        );

        expect(res.status).toHaveBeenCalledWith(400);
        expect(res.json).toHaveBeenCalledWith({ success: false, error: tooLarge });
    });

    it('joins validation messages', () => {
        const res = mockResponse();

        new HttpErrorFilter(detailErrorBody).catch(
            new BadRequestException(['port must be an integer', 'url must be a URL']),
            new ExecutionContextHost([{}, res]),
        );

        expect(res.json).toHaveBeenCalledWith({ detail: 'port must be an integer, url must be a URL' });
    });

    it('reports unknown errors as 500', () => {
        const res = mockResponse();

        new HttpErrorFilter(detailErrorBody).catch(new Error('disk full'), new ExecutionContextHost([{}, res]));

        expect(res.status).toHaveBeenCalledWith(500);
        expect(res.json).toHaveBeenCalledWith({ detail: 'Internal server error: disk full' });
    });
});
