import { describe, it, expect } from 'vitest'
import { Hono } from 'hono'
import { addComponentSchema, componentIndexParam } from '@wavescope/shared'
import { parseBody, parseParams, readJson, isResponse } from '../lib/validate.js'

function bodyApp() {
  const app = new Hono()
  app.post('/test', async (c) => {
    const result = await parseBody(c, addComponentSchema)
    if (isResponse(result)) return result
    return c.json({ parsed: result })
  })
  return app
}

function post(app: Hono, body: string) {
  return app.request('/test', {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body,
  })
}

describe('Validation Helper', () => {
  describe('parseBody', () => {
    it('parses valid JSON body', async () => {
      const res = await post(bodyApp(), JSON.stringify({ kind: 'sine', params: { frequency: 12 } }))

      expect(res.status).toBe(200)
      expect(await res.json()).toEqual({ parsed: { kind: 'sine', params: { frequency: 12 } } })
    })

    it('returns 400 for invalid JSON', async () => {
      const res = await post(bodyApp(), 'not json')

      expect(res.status).toBe(400)
      expect(await res.json()).toEqual({ error: 'Invalid JSON body.' })
    })

    it('returns 400 with field errors for schema violations', async () => {
      const res = await post(bodyApp(), JSON.stringify({ kind: 'sawtooth', enabled: 'yes' }))

      expect(res.status).toBe(400)
      expect(await res.json()).toMatchObject({
        error: 'Validation failed.',
        fields: { kind: [expect.any(String)], enabled: [expect.any(String)] },
      })
    })

    it('accepts optional fields when missing', async () => {
      const res = await post(bodyApp(), JSON.stringify({ kind: 'noise' }))

      expect(res.status).toBe(200)
      expect(await res.json()).toEqual({ parsed: { kind: 'noise' } })
    })

    it('rejects parameter values of the wrong type', async () => {
      const res = await post(bodyApp(), JSON.stringify({ kind: 'sine', params: { frequency: { hz: 3 } } }))
      expect(res.status).toBe(400)
    })
  })

  describe('parseParams', () => {
    const app = new Hono()
    app.get('/items/:index', (c) => {
      const result = parseParams(c, componentIndexParam)
      if (isResponse(result)) return result
      return c.json(result)
    })

    it('coerces a numeric path segment', async () => {
      const res = await app.request('/items/3')
      expect(res.status).toBe(200)
      expect(await res.json()).toEqual({ index: 3 })
    })

    it('rejects a negative or non-numeric segment', async () => {
      expect((await app.request('/items/-1')).status).toBe(400)
      expect((await app.request('/items/abc')).status).toBe(400)
    })
  })

  describe('readJson', () => {
    it('returns any JSON value untouched', async () => {
      const app = new Hono()
      app.post('/test', async (c) => {
        const body = await readJson(c)
        if (isResponse(body)) return body
        return c.json({ body })
      })

      const res = await post(app, '[1,"two"]')
      expect(await res.json()).toEqual({ body: [1, 'two'] })
    })
  })

  describe('isResponse', () => {
    it('returns true for Response instances', () => {
      expect(isResponse(new Response())).toBe(true)
    })

    it('returns false for plain objects', () => {
      expect(isResponse({ kind: 'sine' })).toBe(false)
      expect(isResponse(null)).toBe(false)
      expect(isResponse(42)).toBe(false)
    })
  })
})
