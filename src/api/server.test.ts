import request from 'supertest';
import express from 'express';
import { createApp } from './server';
import { PolicyEngine } from '../core/engine';
import { SCHEMA_ID } from '../core/schema-builder';
import { getDefaultConfig } from '../config';
import { loadResources } from '../resources';
import { VERSION } from '../version';
import { s3UntagDocument, validPolicy } from '../../tests/helpers/fixtures';
import { createRecordingLogger } from '../../tests/helpers/logger';

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe('Warden API Server', () => {
  let app: express.Application;
  let engine: PolicyEngine;
  const logger = createRecordingLogger();

  beforeEach(() => {
    jest.clearAllMocks();
    engine = new PolicyEngine(loadResources(), getDefaultConfig(), logger);
    app = createApp(engine, logger);
  });

  describe('GET /health', () => {
    it('should return health status', async () => {
      const response = await request(app).get('/health');
      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        status: 'ok',
        service: 'warden',
      });
    });
  });

  describe('GET /', () => {
    it('should return API information', async () => {
      const response = await request(app).get('/');
      expect(response.status).toBe(200);
      expect(response.body.name).toBe('Warden');
      expect(response.body.version).toBe(VERSION);
      expect(response.body.endpoints.validate).toBe('POST /validate');
    });
  });

  describe('GET /v0/policy.json', () => {
    it('should serve the schema document', async () => {
      const response = await request(app).get('/v0/policy.json');
      expect(response.status).toBe(200);
      expect(response.body.id).toBe(SCHEMA_ID);
      expect(Object.keys(response.body.definitions.resources)).toEqual(['ec2', 'ebs', 's3']);
    });
  });

  describe('GET /vocabulary', () => {
    it('should list every resource type', async () => {
      const response = await request(app).get('/vocabulary');
      expect(response.status).toBe(200);
      expect(Object.keys(response.body)).toEqual(['ec2', 'ebs', 's3']);
    });

    it('should return one resource type', async () => {
      const response = await request(app).get('/vocabulary/ebs');
      expect(response.status).toBe(200);
      expect(response.body.filters).toEqual(['and', 'event', 'fault-tolerant', 'instance', 'or', 'value']);
      expect(response.body.docs.filters['fault-tolerant']).toBeNull();
    });

    it('should return 404 for an unknown resource type', async () => {
      const response = await request(app).get('/vocabulary/rds');
      expect(response.status).toBe(404);
      expect(response.body).toEqual({ error: 'Not found', message: 'rds is not a valid resource' });
    });
  });

  describe('POST /validate', () => {
    it('should accept a valid document', async () => {
      const response = await request(app).post('/validate').send({ policies: [validPolicy] });

      expect(response.status).toBe(200);
      expect(response.body.id).toMatch(UUID_V4);
      expect(response.body.valid).toBe(true);
      expect(response.body.errors).toEqual([]);
      expect(response.body).not.toHaveProperty('diagnosis');
    });

    it('should report errors with a diagnosis', async () => {
      const response = await request(app).post('/validate').send(s3UntagDocument);

      expect(response.status).toBe(200);
      expect(response.body.valid).toBe(false);
      expect(response.body.errors).toHaveLength(1);
      expect(response.body.diagnosis.policy).toBe('foo');
      expect(response.body.diagnosis.error.path).toEqual(['policies', '0', 'actions', '0']);
    });

    it('should give each validation its own id', async () => {
      const first = await request(app).post('/validate').send({ policies: [] });
      const second = await request(app).post('/validate').send({ policies: [] });

      expect(first.body.id).not.toBe(second.body.id);
    });

    it('should reject a body that is not an object', async () => {
      const response = await request(app).post('/validate').send([{ policies: [] }]);

      expect(response.status).toBe(400);
      expect(response.body.error).toBe('Invalid request');
    });

    it('should pass internal failures to the error handler', async () => {
      jest.spyOn(engine, 'validate').mockImplementation(() => {
        throw new Error('schema unavailable');
      });

      const response = await request(app).post('/validate').send({ policies: [] });

      expect(response.status).toBe(500);
      expect(response.body).toEqual({ error: 'Internal server error', message: 'schema unavailable' });
      expect(logger.error).toHaveBeenCalledWith('[Warden] Error: schema unavailable');
    });
  });
});
